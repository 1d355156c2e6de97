/**
 * Retry Policy
 * Automatic retry with exponential backoff and jitter
 *
 * Delay before retry n (0-based):
 *   min(maxDelayMs, max(baseDelayMs * 2^n + random() * maxJitterMs, retryAfterMs))
 * With the defaults that is roughly 1s, then 2s, then 4s.
 */

import { isGurumeError, isRetryableError } from '../errors/gurume-error.js';

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxJitterMs: number;
  maxDelayMs: number;
}

export interface RetryHooks {
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxJitterMs: 250,
  maxDelayMs: 30_000,
};

/**
 * Carries the attempt count alongside the error that ended the run.
 */
export class RetryOutcome {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {}
}

export function computeBackoff(
  policy: RetryPolicy,
  retryIndex: number,
  random: () => number,
  retryAfterMs?: number
): number {
  const exponential = policy.baseDelayMs * 2 ** retryIndex + random() * policy.maxJitterMs;
  const delay = Math.max(exponential, retryAfterMs ?? 0);
  return Math.min(policy.maxDelayMs, Math.round(delay));
}

/**
 * Execute fn, retrying retryable failures with backoff.
 * Non-retryable errors are rethrown after a single attempt; exhausting the
 * attempts rethrows the last error.
 *
 * @example
 * ```typescript
 * const html = await withRetry(() => transport.get(request), DEFAULT_RETRY_POLICY, {
 *   onRetry: (err, attempt, delayMs) => logger.warn({ attempt, delayMs }, 'retrying'),
 * });
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const outcome = await runWithRetry(fn, policy, hooks);
  if (outcome instanceof RetryOutcome) {
    throw outcome.lastError;
  }
  return outcome.value;
}

/**
 * Same as withRetry, but reports failures as a RetryOutcome instead of throwing,
 * so callers can tell how many attempts were made.
 */
export async function runWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<{ value: T; attempts: number } | RetryOutcome> {
  const shouldRetry = hooks.shouldRetry ?? isRetryableError;
  const wait = hooks.sleep ?? sleep;
  const random = hooks.random ?? Math.random;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 0; ; attempt++) {
    try {
      const value = await fn(attempt);
      return { value, attempts: attempt + 1 };
    } catch (error) {
      if (!shouldRetry(error) || attempt + 1 >= maxAttempts) {
        return new RetryOutcome(attempt + 1, error);
      }

      const retryAfterMs = isGurumeError(error) ? error.details.retryAfterMs : undefined;
      const delayMs = computeBackoff(policy, attempt, random, retryAfterMs);
      hooks.onRetry?.(error, attempt + 1, delayMs);
      await wait(delayMs);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
