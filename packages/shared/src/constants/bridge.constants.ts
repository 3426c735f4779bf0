// ============================================================================
// Bridge Registry — Constants
// ============================================================================

// --- Bridge Role ---

export const BridgeRole = {
  HIP: 'HIP',
  HIU: 'HIU',
} as const;

export type BridgeRole = (typeof BridgeRole)[keyof typeof BridgeRole];

// --- Bridge Status ---
// Bridges are never deleted; SUSPENDED is the soft-delete.

export const BridgeStatus = {
  ACTIVE: 'ACTIVE',
  SUSPENDED: 'SUSPENDED',
} as const;

export type BridgeStatus = (typeof BridgeStatus)[keyof typeof BridgeStatus];

// --- Services a bridge may advertise ---

export const BridgeService = {
  DISCOVERY: 'DISCOVERY',
  LINKING: 'LINKING',
  CONSENT: 'CONSENT',
  DATA_TRANSFER: 'DATA_TRANSFER',
} as const;

export type BridgeService = (typeof BridgeService)[keyof typeof BridgeService];

export const BRIDGE_ID_MAX_LENGTH = 100;
export const CALLBACK_URL_MAX_LENGTH = 500;
