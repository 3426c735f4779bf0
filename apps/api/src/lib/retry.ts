// ---------------------------------------------------------------------------
// Bounded retry with exponential backoff, used only at forwarding steps.
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryOutcome<T> {
  ok: boolean;
  value?: T;
  attempts: number;
  lastError?: unknown;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn` up to `maxAttempts` times, waiting baseDelayMs * 2^(n-1) between
 * attempts. Never throws: the caller decides what exhaustion means.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  onRetry?: (attempt: number, err: unknown) => void,
): Promise<RetryOutcome<T>> {
  const wait = policy.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      const value = await fn(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      lastError = err;
      if (attempt < policy.maxAttempts) {
        onRetry?.(attempt, err);
        await wait(policy.baseDelayMs * 2 ** (attempt - 1));
      }
    }
  }

  return { ok: false, attempts: policy.maxAttempts, lastError };
}
