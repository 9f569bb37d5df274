/**
 * @fileoverview Sliding-window rate limiter with an optional provider quota probe.
 *
 * Every outbound provider request goes through `acquire()`. The limiter keeps
 * the timestamps of recent calls and blocks until both the local window and
 * the provider's own quota allow another request.
 *
 * @module @minutely/collector/rate-limiter
 */

import type { Clock, QuotaStatus, Sleep } from '@minutely/contracts';
import { errorMessage, sleep as defaultSleep, systemClock } from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import { createSilentLogger } from '@minutely/logger';

export interface RateLimiterOptions {
  /** Calls allowed inside one window (default 13) */
  maxCalls?: number;

  /** Window length in milliseconds (default 60000) */
  windowMs?: number;

  /** Extra wait after the oldest call leaves the window */
  windowMarginMs?: number;

  /** Best-effort provider quota check, consulted on every acquire */
  quotaProbe?: () => Promise<QuotaStatus>;

  /** Extra wait on top of the provider's reported refill time */
  quotaMarginMs?: number;

  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
}

export interface RateLimiterStats {
  inWindow: number;
  maxCalls: number;
  windowMs: number;
}

/**
 * Serializes and paces provider requests.
 *
 * Single cooperative caller: `acquire()` must be awaited before the next
 * call starts.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({
 *   maxCalls: 13,
 *   windowMs: 60_000,
 *   quotaProbe: () => provider.remainingQuota(),
 * });
 *
 * await limiter.acquire();
 * const bars = await provider.requestChunk(item, 20250101, 20250131);
 * ```
 */
export class RateLimiter {
  private readonly maxCalls: number;
  private readonly windowMs: number;
  private readonly windowMarginMs: number;
  private readonly quotaMarginMs: number;
  private readonly quotaProbe: (() => Promise<QuotaStatus>) | undefined;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly calls: number[] = [];

  constructor(options: RateLimiterOptions = {}) {
    this.maxCalls = options.maxCalls ?? 13;
    this.windowMs = options.windowMs ?? 60_000;
    this.windowMarginMs = options.windowMarginMs ?? 10;
    this.quotaMarginMs = options.quotaMarginMs ?? 200;
    this.quotaProbe = options.quotaProbe;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createSilentLogger();

    if (!Number.isInteger(this.maxCalls) || this.maxCalls < 1) {
      throw new Error(`maxCalls must be a positive integer, got ${this.maxCalls}`);
    }
    if (this.windowMs <= 0) {
      throw new Error(`windowMs must be positive, got ${this.windowMs}`);
    }
  }

  /**
   * Resolves when another request may be sent, then records it.
   * Never rejects.
   */
  async acquire(): Promise<void> {
    this.evict(this.clock());

    const oldest = this.calls[0];
    if (this.calls.length >= this.maxCalls && oldest !== undefined) {
      const waitMs = this.windowMs - (this.clock() - oldest) + this.windowMarginMs;
      if (waitMs > 0) {
        this.logger.debug('Rate window full, waiting', {
          wait_ms: waitMs,
          in_window: this.calls.length,
        });
        await this.sleep(waitMs);
      }
      this.evict(this.clock());
    }

    await this.waitForQuota();

    this.calls.push(this.clock());
  }

  stats(): RateLimiterStats {
    this.evict(this.clock());
    return { inWindow: this.calls.length, maxCalls: this.maxCalls, windowMs: this.windowMs };
  }

  private evict(now: number): void {
    while (this.calls.length > 0) {
      const oldest = this.calls[0];
      if (oldest === undefined || now - oldest <= this.windowMs) {
        break;
      }
      this.calls.shift();
    }
  }

  private async waitForQuota(): Promise<void> {
    if (!this.quotaProbe) {
      return;
    }

    let status: QuotaStatus;
    try {
      status = await this.quotaProbe();
    } catch (error) {
      // Probe failures fall back to the local window alone
      this.logger.debug('Quota probe failed', { error: errorMessage(error) });
      return;
    }

    if (status.remaining <= 0) {
      const waitMs = Math.max(0, status.waitMs) + this.quotaMarginMs;
      this.logger.info('Provider quota exhausted, waiting', { wait_ms: waitMs });
      await this.sleep(waitMs);
    }
  }
}
