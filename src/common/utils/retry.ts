import { setTimeout as delay } from 'node:timers/promises';

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryHooks {
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Exponential backoff: base, 2·base, 4·base … capped at maxDelayMs.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(policy.maxDelayMs, exponential);
}

/**
 * Run `operation` until it succeeds, throws a non-retryable error, or the
 * attempt budget is spent. The last error is rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks,
): Promise<T> {
  const sleep = hooks.sleep ?? ((ms: number) => delay(ms).then(() => undefined));
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !hooks.isRetryable(error)) {
        throw error;
      }
      const waitMs = backoffDelay(attempt, policy);
      hooks.onRetry?.(error, attempt, waitMs);
      if (waitMs > 0) {
        await sleep(waitMs);
      }
    }
  }
}
