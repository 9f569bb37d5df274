/**
 * @fileoverview Per-item watchdog state machine.
 *
 * Pure: callers pass the current time in, so it runs the same under a
 * real clock and in tests.
 */

import type { LivenessEvent } from './classifier.js';

export type LivenessState = 'idle' | 'armed' | 'terminating';

export type LivenessDecision = 'continue' | 'timeout';

/**
 * Tracks whether the child is inside an item and for how long.
 *
 * - idle: no item in progress
 * - armed: an item started at `armedAt` and has not finished
 * - terminating: the item overran `timeoutMs`; the child is being killed
 *
 * @example
 * ```typescript
 * const monitor = new LivenessMonitor(240_000);
 * monitor.observe({ kind: 'collecting' }, Date.now());
 * if (monitor.check(Date.now()) === 'timeout') {
 *   // kill and restart the child
 * }
 * ```
 */
export class LivenessMonitor {
  private current: LivenessState = 'idle';
  private armedAt: number | undefined;

  constructor(readonly timeoutMs: number) {
    if (timeoutMs <= 0) {
      throw new Error(`timeoutMs must be positive, got ${timeoutMs}`);
    }
  }

  get state(): LivenessState {
    return this.current;
  }

  /**
   * Milliseconds since the current item started, or undefined when idle.
   */
  elapsed(now: number): number | undefined {
    return this.armedAt === undefined ? undefined : now - this.armedAt;
  }

  observe(event: LivenessEvent, now: number): void {
    if (this.current === 'terminating') {
      return;
    }

    switch (event.kind) {
      case 'collecting':
        this.current = 'armed';
        this.armedAt = now;
        break;
      case 'saved':
      case 'start':
      case 'skip':
        this.disarm();
        break;
      case 'other':
        break;
    }
  }

  /**
   * Decides whether the armed item has overrun. A timeout moves the monitor
   * to `terminating`, where it stays until {@link reset}.
   */
  check(now: number): LivenessDecision {
    if (this.current === 'terminating') {
      return 'timeout';
    }
    if (this.current === 'armed' && this.armedAt !== undefined && now - this.armedAt > this.timeoutMs) {
      this.current = 'terminating';
      return 'timeout';
    }
    return 'continue';
  }

  /** Back to idle for a fresh child. */
  reset(): void {
    this.disarm();
  }

  private disarm(): void {
    this.current = 'idle';
    this.armedAt = undefined;
  }
}
