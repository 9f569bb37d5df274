/**
 * @fileoverview Performance timing utilities for measuring operation durations.
 * Uses high-resolution timers (performance.now()).
 */

/**
 * Performance timer for measuring operation durations
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Elapsed milliseconds since start (or until stop, once stopped) */
  elapsed(): number;

  /** Stops the timer and returns the final duration in milliseconds */
  stop(): number;

  /** True until stop() is called */
  isRunning(): boolean;
}

/**
 * Create a new performance timer.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await fetcher.collect(item);
 * logger.info('Item collected', { rows: bars.length, duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    get startTime() {
      return startTime;
    },

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}

/**
 * Measure the duration of an async function.
 *
 * @example
 * ```typescript
 * const { result, duration_ms } = await measureAsync(() => source.listItems());
 * logger.info('Work list built', { count: result.length, duration_ms });
 * ```
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
