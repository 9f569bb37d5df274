/**
 * @fileoverview Tests for performance timing utilities
 */

import { describe, it, expect } from 'vitest';
import { startTimer, measureAsync } from '../src/perf-timer.js';

describe('startTimer', () => {
  it('should measure elapsed time while running', async () => {
    const timer = startTimer();
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(timer.isRunning()).toBe(true);
    expect(timer.elapsed()).toBeGreaterThanOrEqual(25);
  });

  it('should freeze the duration once stopped', async () => {
    const timer = startTimer();
    await new Promise((resolve) => setTimeout(resolve, 10));
    const duration = timer.stop();
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(timer.isRunning()).toBe(false);
    expect(timer.stop()).toBe(duration);
    expect(timer.elapsed()).toBe(duration);
  });
});

describe('measureAsync', () => {
  it('should return the result with its duration', async () => {
    const { result, duration_ms } = await measureAsync(async () => {
      await new Promise((resolve) => setTimeout(resolve, 15));
      return 'done';
    });

    expect(result).toBe('done');
    expect(duration_ms).toBeGreaterThanOrEqual(10);
  });
});
