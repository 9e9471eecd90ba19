/**
 * Bounded retry with exponential backoff.
 * A plain loop over attempts: the bound and the delay policy are both
 * visible here and testable with an injected sleep.
 */

import type { Sleep } from '../types/common.js';
import { RateLimitedError, isRetryable } from '../errors.js';
import { throwIfAborted } from './sleep.js';

export interface RetryPolicy {
  /** Total attempts including the first. */
  maxAttempts: number;
  /** Delay before the second attempt. */
  baseDelayMs: number;
  /** Multiplier applied per further attempt. */
  factor: number;
  /**
   * Upper bound for the exponential delay. A retry-after hint from the
   * server is waited out in full; the caller's deadline bounds it.
   */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2_000,
  factor: 2,
  maxDelayMs: 60_000,
};

/**
 * Delay before attempt `attempt + 1`, where `attempt` is the 1-based number
 * of the attempt that just failed.
 */
export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  retryAfterSeconds?: number | null
): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.factor, attempt - 1);
  const hinted =
    retryAfterSeconds !== null && retryAfterSeconds !== undefined
      ? retryAfterSeconds * 1000
      : 0;
  return Math.max(Math.min(policy.maxDelayMs, exponential), hinted);
}

export interface RetryOptions {
  policy: RetryPolicy;
  sleep: Sleep;
  signal?: AbortSignal;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const maxAttempts = Math.max(1, options.policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await operation(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !shouldRetry(err)) {
        throw err;
      }

      const retryAfter =
        err instanceof RateLimitedError ? err.retryAfterSeconds : null;
      const delayMs = computeBackoffDelay(options.policy, attempt, retryAfter);
      options.onRetry?.(err, attempt, delayMs);
      await options.sleep(delayMs, options.signal);
    }
  }
}
