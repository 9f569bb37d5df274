/**
 * @fileoverview Linear backoff policy shared by every retry path.
 *
 * One function decides how long to wait before the next attempt, keyed by
 * the attempt index and by what went wrong. The chunk fetcher and the
 * listing page fetcher both use it.
 *
 * @module @minutely/contracts/retry
 */

/**
 * Why an attempt did not produce a usable result.
 * - 'error': the request threw (transport failure, 5xx, timeout)
 * - 'empty': the request succeeded with no rows
 * - 'coarse': rows came back at a coarser granularity than requested
 */
export type FailureKind = 'error' | 'empty' | 'coarse';

/**
 * Delay = baseMs + stepMs * attempt, per failure kind.
 */
export type RetryPolicy = Record<FailureKind, { baseMs: number; stepMs: number }>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  error: { baseMs: 800, stepMs: 500 },
  empty: { baseMs: 400, stepMs: 300 },
  coarse: { baseMs: 600, stepMs: 500 },
};

/**
 * Milliseconds to wait after a failed attempt.
 *
 * @param attempt - Zero-based index of the attempt that just failed
 * @param kind - What went wrong
 * @param policy - Backoff table
 *
 * @example
 * ```typescript
 * retryDelay(0, 'error'); // 800
 * retryDelay(2, 'empty'); // 1000
 * ```
 */
export function retryDelay(
  attempt: number,
  kind: FailureKind,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): number {
  const { baseMs, stepMs } = policy[kind];
  return baseMs + stepMs * Math.max(0, attempt);
}
