// ============================================================================
// Data Transfer — Constants
// ============================================================================

// --- Transfer Job State ---
// PENDING -> FORWARDED -> DELIVERED
// PENDING -> DELIVERED (HIP answered before the forward outcome was recorded)
// PENDING | FORWARDED -> FAILED
// DELIVERED -> FAILED only when forwarding to the HIU is exhausted (payload kept)

export const TransferState = {
  PENDING: 'PENDING',
  FORWARDED: 'FORWARDED',
  DELIVERED: 'DELIVERED',
  FAILED: 'FAILED',
} as const;

export type TransferState = (typeof TransferState)[keyof typeof TransferState];

export const TRANSFER_VALID_TRANSITIONS: Readonly<
  Record<TransferState, readonly TransferState[]>
> = Object.freeze({
  [TransferState.PENDING]: [TransferState.FORWARDED, TransferState.DELIVERED, TransferState.FAILED],
  [TransferState.FORWARDED]: [TransferState.DELIVERED, TransferState.FAILED],
  [TransferState.DELIVERED]: [TransferState.FAILED],
  [TransferState.FAILED]: [],
});

export const TransferFailureReason = {
  TIMEOUT: 'TIMEOUT',
  FORWARD_FAILED: 'FORWARD_FAILED',
  HIU_FORWARD_FAILED: 'HIU_FORWARD_FAILED',
} as const;

export type TransferFailureReason =
  (typeof TransferFailureReason)[keyof typeof TransferFailureReason];

export const DEFAULT_DELIVERY_TIMEOUT_SECONDS = 60;
