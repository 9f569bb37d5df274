/**
 * @fileoverview Detection of silently downgraded (daily instead of minute) responses.
 */

import type { Bar } from '@minutely/contracts';

export interface GranularityOptions {
  /** At most this many distinct times counts as suspicious (default 5) */
  maxCoarseDistinctTimes: number;

  /** Time value daily bars carry, HHMM (default 1530, session close) */
  sessionCloseTime: number;
}

export const DEFAULT_GRANULARITY: GranularityOptions = {
  maxCoarseDistinctTimes: 5,
  sessionCloseTime: 1530,
};

/**
 * Whether a response looks like real minute data.
 *
 * Empty sets are never fine-grained. A set with only a handful of distinct
 * times that includes the session close is treated as a daily downgrade.
 *
 * @example
 * ```typescript
 * isFineGrained([{ date: 20250102, time: 1530, ... }]); // false
 * ```
 */
export function isFineGrained(
  bars: readonly Bar[],
  options: GranularityOptions = DEFAULT_GRANULARITY
): boolean {
  if (bars.length === 0) {
    return false;
  }

  const times = new Set(bars.map((bar) => bar.time));
  return !(times.size <= options.maxCoarseDistinctTimes && times.has(options.sessionCloseTime));
}
