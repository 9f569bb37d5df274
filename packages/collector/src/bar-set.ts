/**
 * @fileoverview Normalization of raw provider bars into an ordered, key-unique set.
 */

import type { Bar } from '@minutely/contracts';

function compareBars(a: Bar, b: Bar): number {
  return a.date - b.date || a.time - b.time;
}

/**
 * Sorts bars by (date, time) and drops later duplicates of the same key.
 *
 * The sort is stable, so the first occurrence in provider order wins.
 */
export function normalizeBarSet(bars: readonly Bar[]): Bar[] {
  const sorted = [...bars].sort(compareBars);
  const out: Bar[] = [];
  let previous: Bar | undefined;

  for (const bar of sorted) {
    if (previous && compareBars(previous, bar) === 0) {
      continue;
    }
    out.push(bar);
    previous = bar;
  }

  return out;
}
