// ============================================================================
// Consent approval channel
// Tells the patient-facing app that a consent request awaits a decision.
// The decision comes back as a CONSENT_GRANTED / CONSENT_DENIED callback.
// ============================================================================

import type { RecordType } from '@consent-gateway/shared/constants/consent.constants.js';
import { postJson, type OutboundConfig } from '../../lib/bridge-client.js';
import type { Logger } from '../../lib/logger.js';

export interface ConsentNotification {
  consentId: string;
  patientId: string;
  hiuId: string;
  hipId: string;
  dateRange: { from: Date; to: Date };
  recordTypes: RecordType[];
}

export interface ConsentNotifier {
  notify(notification: ConsentNotification): Promise<void>;
}

export function createHttpConsentNotifier(url: string, outbound: OutboundConfig): ConsentNotifier {
  return {
    async notify(notification) {
      await postJson(
        url,
        {
          ...notification,
          dateRange: {
            from: notification.dateRange.from.toISOString(),
            to: notification.dateRange.to.toISOString(),
          },
          callbackPath: `/callback/${notification.consentId}`,
        },
        outbound,
      );
    },
  };
}

export function createLoggingConsentNotifier(logger: Logger): ConsentNotifier {
  return {
    async notify(notification) {
      logger.info(
        { consentId: notification.consentId, patientId: notification.patientId },
        'consent approval requested (no CONSENT_NOTIFY_URL configured)',
      );
    },
  };
}
