import { systemClock, type Clock } from './clock.js';

export interface BackoffPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialDelayMs: 500,
  maxDelayMs: 30_000,
};

/**
 * Delay before the next try after `attempt` failed tries (1-based):
 * initial * 2^(attempt - 1), capped at maxDelayMs. A platform-supplied
 * retry-after raises the delay, it never shortens it.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  retryAfterMs?: number
): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = Math.min(policy.maxDelayMs, policy.initialDelayMs * Math.pow(2, exponent));
  return retryAfterMs !== undefined ? Math.max(delay, retryAfterMs) : delay;
}

export interface RetryOptions {
  maxAttempts?: number;
  policy?: BackoffPolicy;
  clock?: Clock;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? 3;
  const clock = options.clock ?? systemClock;
  const shouldRetry = options.shouldRetry ?? (() => true);

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === maxAttempts || !shouldRetry(error) || options.signal?.aborted) {
        throw error;
      }
      const delay = computeBackoffDelay(attempt, options.policy);
      options.onRetry?.(error, attempt, delay);
      await clock.sleep(delay, options.signal);
    }
  }
  throw lastError;
}
