// ============================================================================
// Gateway — Shared Constants
// Error codes, inter-bridge headers, callback kinds, protocol defaults.
// ============================================================================

// --- Error Codes ---

export const GatewayErrorCode = {
  // Validation (400), never retried
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_RANGE: 'INVALID_RANGE',
  INVALID_SCOPE: 'INVALID_SCOPE',
  INVALID_OTP: 'INVALID_OTP',
  BRIDGE_ROLE_MISMATCH: 'BRIDGE_ROLE_MISMATCH',

  // Authentication / authorization
  UNAUTHORIZED: 'UNAUTHORIZED',
  MISSING_HEADER: 'MISSING_HEADER',
  CONSENT_NOT_ACTIVE: 'CONSENT_NOT_ACTIVE',
  BRIDGE_SUSPENDED: 'BRIDGE_SUSPENDED',

  // State conflicts: caller must re-initiate the flow
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  ALREADY_CONFIRMED: 'ALREADY_CONFIRMED',
  ALREADY_DELIVERED: 'ALREADY_DELIVERED',
  REQUEST_EXPIRED: 'REQUEST_EXPIRED',
  DUPLICATE_BRIDGE: 'DUPLICATE_BRIDGE',

  // Not found
  UNKNOWN_BRIDGE: 'UNKNOWN_BRIDGE',
  UNKNOWN_REQUEST: 'UNKNOWN_REQUEST',
  UNKNOWN_CONSENT: 'UNKNOWN_CONSENT',
  UNKNOWN_JOB: 'UNKNOWN_JOB',
  UNKNOWN_CORRELATION: 'UNKNOWN_CORRELATION',

  // Webhook routing
  UNEXPECTED_CALLBACK: 'UNEXPECTED_CALLBACK',

  // Outbound
  TRANSIENT_REMOTE_FAILURE: 'TRANSIENT_REMOTE_FAILURE',
} as const;

export type GatewayErrorCode =
  (typeof GatewayErrorCode)[keyof typeof GatewayErrorCode];

// --- Inter-bridge Headers ---
// Fastify lower-cases incoming header names.

export const GatewayHeader = {
  AUTHORIZATION: 'authorization',
  REQUEST_ID: 'request-id',
  TIMESTAMP: 'timestamp',
  CM_ID: 'x-cm-id',
} as const;

export type GatewayHeader = (typeof GatewayHeader)[keyof typeof GatewayHeader];

export const REQUIRED_BRIDGE_HEADERS = Object.freeze([
  GatewayHeader.REQUEST_ID,
  GatewayHeader.TIMESTAMP,
  GatewayHeader.CM_ID,
] as const);

// --- Callback Kinds ---

export const CallbackKind = {
  DISCOVERY_RESULT: 'DISCOVERY_RESULT',
  CONSENT_GRANTED: 'CONSENT_GRANTED',
  CONSENT_DENIED: 'CONSENT_DENIED',
  DATA_DELIVERED: 'DATA_DELIVERED',
} as const;

export type CallbackKind = (typeof CallbackKind)[keyof typeof CallbackKind];

// --- Callback Owners (the state machine waiting on a correlation id) ---

export const CallbackOwner = {
  LINK: 'LINK',
  CONSENT: 'CONSENT',
  TRANSFER: 'TRANSFER',
} as const;

export type CallbackOwner = (typeof CallbackOwner)[keyof typeof CallbackOwner];

// --- Token Defaults ---

export const TOKEN_TYPE = 'Bearer';
export const DEFAULT_TOKEN_TTL_SECONDS = 3600;

// --- Outbound Defaults ---

export const DEFAULT_OUTBOUND_TIMEOUT_MS = 10_000;
export const DEFAULT_FORWARD_MAX_ATTEMPTS = 3;
export const DEFAULT_FORWARD_BACKOFF_MS = 250;

// --- Housekeeping ---

export const DEFAULT_SWEEP_INTERVAL_SECONDS = 30;
