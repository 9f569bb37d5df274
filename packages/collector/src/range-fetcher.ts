/**
 * @fileoverview Chunked minute-bar fetching with retry and range bisection.
 *
 * The provider sometimes answers a long-range minute request with nothing,
 * or with daily bars. Requests are retried with backoff; a range that still
 * yields nothing is split in half and each half fetched on its own, down to
 * single days.
 *
 * @module @minutely/collector/range-fetcher
 */

import type {
  Bar,
  ChunkProvider,
  Clock,
  DateRange,
  FailureKind,
  RetryPolicy,
  Sleep,
  WorkItem,
} from '@minutely/contracts';
import {
  DEFAULT_RETRY_POLICY,
  bisectRange,
  calendarDateOf,
  dayCount,
  errorMessage,
  formatRange,
  isProviderRateLimitError,
  lookbackWindow,
  monthChunks,
  retryDelay,
  sleep as defaultSleep,
  systemClock,
  toYmd,
} from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import { createSilentLogger } from '@minutely/logger';
import { normalizeBarSet } from './bar-set.js';
import { DEFAULT_GRANULARITY, isFineGrained } from './granularity.js';
import type { GranularityOptions } from './granularity.js';
import type { RateLimiter } from './rate-limiter.js';

export interface RangeFetcherOptions {
  provider: ChunkProvider;
  limiter: Pick<RateLimiter, 'acquire'>;

  /** Attempts per request before giving up on a range (default 3) */
  maxAttempts?: number;

  /** Days of history to collect (default 730) */
  lookbackDays?: number;

  /** Extra leading days so the window edge is covered (default 7) */
  bufferDays?: number;

  retryPolicy?: RetryPolicy;
  granularity?: GranularityOptions;
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Collects the full minute history of one work item.
 */
export interface ItemCollector {
  collect(item: WorkItem): Promise<Bar[]>;
}

/**
 * Fetches minute bars for a work item over the lookback window.
 *
 * @example
 * ```typescript
 * const fetcher = new RangeFetcher({ provider, limiter, logger });
 * const bars = await fetcher.collect('A005930');
 * ```
 */
export class RangeFetcher implements ItemCollector {
  private readonly provider: ChunkProvider;
  private readonly limiter: Pick<RateLimiter, 'acquire'>;
  private readonly maxAttempts: number;
  private readonly lookbackDays: number;
  private readonly bufferDays: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly granularity: GranularityOptions;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(options: RangeFetcherOptions) {
    this.provider = options.provider;
    this.limiter = options.limiter;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.lookbackDays = options.lookbackDays ?? 730;
    this.bufferDays = options.bufferDays ?? 7;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.granularity = options.granularity ?? DEFAULT_GRANULARITY;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * The window collected for a run started now: ends yesterday.
   */
  collectionWindow(): DateRange {
    const today = calendarDateOf(new Date(this.clock()));
    return lookbackWindow(today, this.lookbackDays, this.bufferDays);
  }

  /**
   * Fetches every month of the lookback window and returns a sorted,
   * key-unique bar set (empty when the provider had nothing).
   */
  async collect(item: WorkItem): Promise<Bar[]> {
    const window = this.collectionWindow();
    const bars: Bar[] = [];

    for (const chunk of monthChunks(window)) {
      const chunkBars = await this.fetchRange(item, chunk);
      bars.push(...chunkBars);
    }

    const normalized = normalizeBarSet(bars);
    this.logger.debug('Item window fetched', {
      item,
      range: formatRange(window),
      raw_rows: bars.length,
      rows: normalized.length,
    });
    return normalized;
  }

  /**
   * Fetches a range as a sorted, key-unique bar set, bisecting it while the
   * provider keeps returning nothing usable. A single day that is still empty
   * gets exactly one further request whose result is final.
   */
  async fetchRange(item: WorkItem, range: DateRange): Promise<Bar[]> {
    const bars = await this.requestWithRetry(item, range);
    if (bars.length > 0) {
      return normalizeBarSet(bars);
    }

    if (dayCount(range) <= 1) {
      return normalizeBarSet(await this.requestOnce(item, range));
    }

    const [left, right] = bisectRange(range);
    this.logger.debug('Range yielded nothing, bisecting', {
      item,
      range: formatRange(range),
      left: formatRange(left),
      right: formatRange(right),
    });

    const leftBars = await this.fetchRange(item, left);
    const rightBars = await this.fetchRange(item, right);
    return normalizeBarSet([...leftBars, ...rightBars]);
  }

  /**
   * One rate-limited request with no retry. A failure counts as no data.
   */
  private async requestOnce(item: WorkItem, range: DateRange): Promise<Bar[]> {
    await this.limiter.acquire();
    try {
      return await this.provider.requestChunk(item, toYmd(range.start), toYmd(range.end));
    } catch (error) {
      this.logger.warn('Final day request failed', {
        item,
        range: formatRange(range),
        error: errorMessage(error),
      });
      return [];
    }
  }

  /**
   * Requests a range up to `maxAttempts` times. Returns the first non-empty,
   * fine-grained response, or an empty array.
   */
  async requestWithRetry(item: WorkItem, range: DateRange): Promise<Bar[]> {
    const fromYmd = toYmd(range.start);
    const toYmdValue = toYmd(range.end);

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      await this.limiter.acquire();

      let kind: FailureKind;
      let minimumWaitMs = 0;

      try {
        const bars = await this.provider.requestChunk(item, fromYmd, toYmdValue);
        if (bars.length === 0) {
          kind = 'empty';
        } else if (!isFineGrained(bars, this.granularity)) {
          kind = 'coarse';
          this.logger.debug('Coarse response discarded', {
            item,
            range: formatRange(range),
            rows: bars.length,
          });
        } else {
          return bars;
        }
      } catch (error) {
        kind = 'error';
        if (isProviderRateLimitError(error)) {
          minimumWaitMs = error.retryAfterMs ?? 0;
        }
        this.logger.warn('Chunk request failed', {
          item,
          range: formatRange(range),
          attempt: attempt + 1,
          error: errorMessage(error),
        });
      }

      if (attempt + 1 < this.maxAttempts) {
        await this.sleep(Math.max(retryDelay(attempt, kind, this.retryPolicy), minimumWaitMs));
      }
    }

    return [];
  }
}
