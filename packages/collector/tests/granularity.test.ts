import { describe, it, expect } from 'vitest';
import type { Bar } from '@minutely/contracts';
import { isFineGrained } from '../src/granularity.js';
import { normalizeBarSet } from '../src/bar-set.js';

function bar(date: number, time: number, close = 100): Bar {
  return { date, time, open: 100, high: 101, low: 99, close, volume: 10 };
}

describe('isFineGrained', () => {
  it('should reject empty sets', () => {
    expect(isFineGrained([])).toBe(false);
  });

  it('should flag a few bars stamped at the session close', () => {
    const daily = [20250102, 20250103, 20250106].map((date) => bar(date, 1530));
    expect(isFineGrained(daily)).toBe(false);
  });

  it('should accept many distinct times', () => {
    const minutes = [901, 902, 903, 904, 905, 1530].map((time) => bar(20250102, time));
    expect(isFineGrained(minutes)).toBe(true);
  });

  it('should accept a few times that avoid the session close', () => {
    expect(isFineGrained([bar(20250102, 901), bar(20250102, 902)])).toBe(true);
  });

  it('should honour custom thresholds', () => {
    const bars = [bar(20250102, 1500), bar(20250103, 1500)];
    expect(isFineGrained(bars, { maxCoarseDistinctTimes: 1, sessionCloseTime: 1500 })).toBe(false);
  });
});

describe('normalizeBarSet', () => {
  it('should sort by date then time and keep the first duplicate', () => {
    const result = normalizeBarSet([
      bar(20250103, 901),
      bar(20250102, 902),
      bar(20250102, 901, 1),
      bar(20250102, 901, 2),
    ]);

    expect(result.map((b) => [b.date, b.time, b.close])).toEqual([
      [20250102, 901, 1],
      [20250102, 902, 100],
      [20250103, 901, 100],
    ]);
  });

  it('should return an empty set for no input', () => {
    expect(normalizeBarSet([])).toEqual([]);
  });
});
