/**
 * @fileoverview Progress lines on stdout.
 *
 * These lines are read by the supervisor to decide whether the collector is
 * alive, so their shapes are fixed:
 *
 * - `[3/2677] A005930 Samsung -> collecting...`
 * - `[4/2677] A000660 Hynix -> exists, skip`
 * - `saved 72161 rows`
 *
 * Structured logs go to stderr and never use these shapes.
 *
 * @module @minutely/collector/progress
 */

import type { WorkItem } from '@minutely/contracts';

/** Anything with a synchronous `write(string)`, such as `process.stdout`. */
export interface LineSink {
  write(chunk: string): unknown;
}

function position(index: number, total: number, item: WorkItem, name: string): string {
  const label = name ? `${item} ${name}` : item;
  return `[${index + 1}/${total}] ${label}`;
}

export function formatStartLine(index: number, total: number, item: WorkItem, name = ''): string {
  return `${position(index, total, item, name)} -> collecting...`;
}

export function formatSkipLine(index: number, total: number, item: WorkItem, name = ''): string {
  return `${position(index, total, item, name)} -> exists, skip`;
}

export function formatSavedLine(rows: number): string {
  return `saved ${rows} rows`;
}

/**
 * Writes one progress line per event.
 */
export class ProgressReporter {
  constructor(private readonly out: LineSink = process.stdout) {}

  runStarted(total: number, startIndex: number): void {
    this.line(`total ${total} items, starting at #${startIndex + 1}`);
  }

  itemSkipped(index: number, total: number, item: WorkItem, name = ''): void {
    this.line(formatSkipLine(index, total, item, name));
  }

  itemStarted(index: number, total: number, item: WorkItem, name = ''): void {
    this.line(formatStartLine(index, total, item, name));
  }

  itemSaved(rows: number): void {
    this.line(formatSavedLine(rows));
  }

  itemEmpty(): void {
    this.line(' empty');
  }

  itemFailed(message: string): void {
    // Keep the failure on one line so it cannot look like another marker
    this.line(` FAILED (${message.replace(/\r?\n/g, ' ')})`);
  }

  runFinished(saved: number, skipped: number, empty: number, failed: number): void {
    this.line(`done: ${saved} saved, ${skipped} skipped, ${empty} empty, ${failed} failed`);
  }

  private line(text: string): void {
    this.out.write(`${text}\n`);
  }
}
