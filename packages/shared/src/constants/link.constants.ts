// ============================================================================
// Patient Linking — Constants
// ============================================================================

// --- Link Request State ---
// INITIATED -> OTP_SENT -> CONFIRMED
// OTP_SENT -> FAILED (attempts exhausted)
// INITIATED | OTP_SENT -> EXPIRED (TTL elapsed)

export const LinkState = {
  INITIATED: 'INITIATED',
  OTP_SENT: 'OTP_SENT',
  CONFIRMED: 'CONFIRMED',
  FAILED: 'FAILED',
  EXPIRED: 'EXPIRED',
} as const;

export type LinkState = (typeof LinkState)[keyof typeof LinkState];

export const LINK_TERMINAL_STATES: ReadonlySet<LinkState> = new Set([
  LinkState.CONFIRMED,
  LinkState.FAILED,
  LinkState.EXPIRED,
]);

export const LINK_VALID_TRANSITIONS: Readonly<Record<LinkState, readonly LinkState[]>> =
  Object.freeze({
    [LinkState.INITIATED]: [LinkState.OTP_SENT, LinkState.EXPIRED],
    [LinkState.OTP_SENT]: [LinkState.CONFIRMED, LinkState.FAILED, LinkState.EXPIRED],
    [LinkState.CONFIRMED]: [],
    [LinkState.FAILED]: [],
    [LinkState.EXPIRED]: [],
  });

export const LinkFailureReason = {
  OTP_ATTEMPTS_EXHAUSTED: 'OTP_ATTEMPTS_EXHAUSTED',
} as const;

export type LinkFailureReason =
  (typeof LinkFailureReason)[keyof typeof LinkFailureReason];

export const DEFAULT_LINK_TTL_SECONDS = 600; // 10 minutes
export const DEFAULT_MAX_OTP_ATTEMPTS = 3;
export const OTP_LENGTH = 6;
