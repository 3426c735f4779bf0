// ============================================================================
// OTP dispatch collaborator
// The gateway only generates and verifies OTPs; delivery to the patient is
// an external service reached over HTTP when OTP_SERVICE_URL is set.
// ============================================================================

import { postJson, type OutboundConfig } from '../../lib/bridge-client.js';
import type { Logger } from '../../lib/logger.js';

export interface OtpMessage {
  requestId: string;
  patientRef: string;
  hipId: string;
  otp: string;
  expiresAt: Date;
}

export interface OtpDispatcher {
  send(message: OtpMessage): Promise<void>;
}

export function createHttpOtpDispatcher(url: string, outbound: OutboundConfig): OtpDispatcher {
  return {
    async send(message) {
      await postJson(
        url,
        {
          requestId: message.requestId,
          patientRef: message.patientRef,
          hipId: message.hipId,
          otp: message.otp,
          expiresAt: message.expiresAt.toISOString(),
        },
        outbound,
      );
    },
  };
}

/**
 * Development stand-in: writes the OTP to the debug log instead of sending
 * it anywhere.
 */
export function createLoggingOtpDispatcher(logger: Logger): OtpDispatcher {
  return {
    async send(message) {
      logger.debug(
        { requestId: message.requestId, patientRef: message.patientRef, otp: message.otp },
        'otp dispatch (no OTP_SERVICE_URL configured)',
      );
    },
  };
}
