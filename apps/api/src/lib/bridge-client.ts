// ============================================================================
// Outbound bridge client
// Every gateway -> bridge call goes through here: bearer token, request id,
// timestamp and consent-manager id headers, AbortController timeout.
// ============================================================================

import { randomUUID } from 'node:crypto';
import type { SelectBridge } from '@consent-gateway/shared/schemas/db/gateway.schema.js';
import type { RecordType } from '@consent-gateway/shared/constants/consent.constants.js';
import { RemoteCallError } from './errors.js';

// ---------------------------------------------------------------------------
// Paths appended to a bridge's registered callback URL
// ---------------------------------------------------------------------------

export const BridgePath = {
  DISCOVER: '/care-contexts/discover',
  HEALTH_INFORMATION_REQUEST: '/health-information/request',
  HEALTH_INFORMATION_TRANSFER: '/health-information/transfer',
} as const;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type BridgeTarget = Pick<SelectBridge, 'bridgeId' | 'callbackUrl'>;

export interface DiscoverRequest {
  requestId: string;
  patientRef: string;
}

export interface HealthInformationRequest {
  transferId: string;
  consentId: string;
  patientId: string;
  recordTypes: RecordType[];
  dateRange: { from: string; to: string };
}

export interface HealthInformationTransfer {
  transferId: string;
  consentId: string;
  hipId: string;
  payload: string;
}

export interface BridgeClient {
  discover(bridge: BridgeTarget, body: DiscoverRequest): Promise<void>;
  requestHealthInformation(bridge: BridgeTarget, body: HealthInformationRequest): Promise<void>;
  transferHealthInformation(bridge: BridgeTarget, body: HealthInformationTransfer): Promise<void>;
}

export interface OutboundConfig {
  cmId: string;
  timeoutMs: number;
  /** Returns the gateway's own bearer token for the call being made. */
  getAccessToken: () => string;
  fetchImpl?: typeof fetch;
}

// ---------------------------------------------------------------------------
// POST helper shared with the OTP and consent notification collaborators
// ---------------------------------------------------------------------------

export async function postJson(
  url: string,
  body: unknown,
  config: OutboundConfig,
): Promise<void> {
  const doFetch = config.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), config.timeoutMs);

  let response: Response;
  try {
    response = await doFetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${config.getAccessToken()}`,
        'REQUEST-ID': randomUUID(),
        TIMESTAMP: new Date().toISOString(),
        'X-CM-ID': config.cmId,
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RemoteCallError(`POST ${url} failed: ${reason}`);
  } finally {
    clearTimeout(timer);
  }

  // Answers carry nothing the gateway reads; release the connection.
  await response.body?.cancel();

  if (!response.ok) {
    throw new RemoteCallError(`POST ${url} answered ${response.status}`, response.status);
  }
}

function joinUrl(base: string, path: string): string {
  return base.replace(/\/+$/, '') + path;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createBridgeClient(config: OutboundConfig): BridgeClient {
  return {
    async discover(bridge, body) {
      await postJson(joinUrl(bridge.callbackUrl, BridgePath.DISCOVER), body, config);
    },

    async requestHealthInformation(bridge, body) {
      await postJson(
        joinUrl(bridge.callbackUrl, BridgePath.HEALTH_INFORMATION_REQUEST),
        body,
        config,
      );
    },

    async transferHealthInformation(bridge, body) {
      await postJson(
        joinUrl(bridge.callbackUrl, BridgePath.HEALTH_INFORMATION_TRANSFER),
        body,
        config,
      );
    },
  };
}
