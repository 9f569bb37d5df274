/**
 * @fileoverview Maps child output lines to liveness events.
 *
 * The collector prints three line shapes the supervisor cares about. The
 * patterns are data, so a different child can be watched by passing its own.
 *
 * @module @minutely/supervisor/classifier
 */

/**
 * What one line of child output says about progress.
 */
export type LivenessEvent =
  | { kind: 'start'; index: number; total: number }
  | { kind: 'collecting' }
  | { kind: 'saved'; rows: number }
  | { kind: 'skip' }
  | { kind: 'other' };

export interface LinePatterns {
  /** Position prefix, capturing index and total, e.g. `[3/2677]` */
  start: RegExp;

  /** Item work has begun */
  collecting: RegExp;

  /** Item work has finished; first capture group is the row count */
  saved: RegExp;

  /** Item was already done */
  skip: RegExp;
}

export const DEFAULT_PATTERNS: LinePatterns = {
  start: /^\[\s*(\d+)\s*\/\s*(\d+)\s*\]/,
  collecting: /->\s*collecting/i,
  saved: /\bsaved\s+(\d[\d,]*)\s+rows\b/i,
  skip: /->\s*exists,\s*skip/,
};

export type LineClassifier = (line: string) => LivenessEvent;

/**
 * Builds a classifier over the given patterns.
 *
 * Precedence on a single line: saved, collecting, skip, start.
 *
 * @example
 * ```typescript
 * const classify = createLineClassifier();
 * classify('[1/2] A005930 -> collecting...'); // { kind: 'collecting' }
 * classify('saved 72,161 rows');               // { kind: 'saved', rows: 72161 }
 * ```
 */
export function createLineClassifier(patterns: LinePatterns = DEFAULT_PATTERNS): LineClassifier {
  return (line) => {
    const saved = patterns.saved.exec(line);
    if (saved) {
      return { kind: 'saved', rows: Number((saved[1] ?? '0').replaceAll(',', '')) };
    }
    if (patterns.collecting.test(line)) {
      return { kind: 'collecting' };
    }
    if (patterns.skip.test(line)) {
      return { kind: 'skip' };
    }
    const start = patterns.start.exec(line);
    if (start) {
      return { kind: 'start', index: Number(start[1]), total: Number(start[2]) };
    }
    return { kind: 'other' };
  };
}

export const classifyLine: LineClassifier = createLineClassifier();
