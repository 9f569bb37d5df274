/**
 * @fileoverview Calendar-date ranges and their arithmetic.
 *
 * Dates are plain `YYYY-MM-DD` strings. All arithmetic runs on UTC midnight
 * so that day counts never drift with the host timezone or DST.
 *
 * @module @minutely/contracts/dates
 */

/**
 * Calendar date in `YYYY-MM-DD` form.
 */
export type CalendarDate = string;

/**
 * Inclusive calendar-date interval.
 *
 * @invariant start <= end
 */
export interface DateRange {
  start: CalendarDate;
  end: CalendarDate;
}

const MS_PER_DAY = 86_400_000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function toUtc(date: CalendarDate): number {
  const match = DATE_PATTERN.exec(date);
  if (!match) {
    throw new Error(`Invalid calendar date: "${date}" (expected YYYY-MM-DD)`);
  }
  const [, year, month, day] = match;
  const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
  if (formatUtc(ms) !== date) {
    throw new Error(`Invalid calendar date: "${date}"`);
  }
  return ms;
}

function formatUtc(ms: number): CalendarDate {
  const d = new Date(ms);
  const year = d.getUTCFullYear();
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Validates a `YYYY-MM-DD` string, rejecting impossible dates like `2024-02-30`.
 */
export function isCalendarDate(value: string): boolean {
  try {
    toUtc(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Local calendar date of a point in time.
 *
 * Uses the host's local fields, matching the exchange-local notion of "today".
 */
export function calendarDateOf(instant: Date): CalendarDate {
  const year = instant.getFullYear();
  const month = String(instant.getMonth() + 1).padStart(2, '0');
  const day = String(instant.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Shifts a date by a (possibly negative) number of days.
 *
 * @example
 * ```typescript
 * addDays('2024-02-28', 2); // '2024-03-01'
 * ```
 */
export function addDays(date: CalendarDate, days: number): CalendarDate {
  return formatUtc(toUtc(date) + days * MS_PER_DAY);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round((toUtc(to) - toUtc(from)) / MS_PER_DAY);
}

/**
 * Number of calendar days covered by an inclusive range.
 *
 * @example
 * ```typescript
 * dayCount({ start: '2024-01-01', end: '2024-01-01' }); // 1
 * dayCount({ start: '2024-01-01', end: '2024-01-31' }); // 31
 * ```
 */
export function dayCount(range: DateRange): number {
  return daysBetween(range.start, range.end) + 1;
}

/**
 * Integer `YYYYMMDD` wire form of a date.
 */
export function toYmd(date: CalendarDate): number {
  toUtc(date);
  return Number(date.replaceAll('-', ''));
}

/**
 * Parses the integer `YYYYMMDD` wire form.
 */
export function fromYmd(ymd: number): CalendarDate {
  const raw = String(ymd).padStart(8, '0');
  const date = `${raw.slice(0, 4)}-${raw.slice(4, 6)}-${raw.slice(6, 8)}`;
  toUtc(date);
  return date;
}

/**
 * Builds a validated range.
 *
 * @throws Error if either bound is invalid or start is after end
 */
export function dateRange(start: CalendarDate, end: CalendarDate): DateRange {
  if (daysBetween(start, end) < 0) {
    throw new Error(`Invalid range: ${start} is after ${end}`);
  }
  return { start, end };
}

/**
 * Splits a range into calendar-month chunks, clipped to the range, in
 * chronological order.
 *
 * @example
 * ```typescript
 * monthChunks({ start: '2024-01-20', end: '2024-03-05' });
 * // [
 * //   { start: '2024-01-20', end: '2024-01-31' },
 * //   { start: '2024-02-01', end: '2024-02-29' },
 * //   { start: '2024-03-01', end: '2024-03-05' }
 * // ]
 * ```
 */
export function monthChunks(range: DateRange): DateRange[] {
  const endMs = toUtc(range.end);
  const chunks: DateRange[] = [];

  const first = new Date(toUtc(range.start));
  let cursor = Date.UTC(first.getUTCFullYear(), first.getUTCMonth(), 1);

  while (cursor <= endMs) {
    const d = new Date(cursor);
    const nextMonth = Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + 1, 1);
    const chunkStart = Math.max(cursor, toUtc(range.start));
    const chunkEnd = Math.min(endMs, nextMonth - MS_PER_DAY);
    chunks.push({ start: formatUtc(chunkStart), end: formatUtc(chunkEnd) });
    cursor = nextMonth;
  }

  return chunks;
}

/**
 * Splits a multi-day range at its midpoint into `[start, mid]` and
 * `[mid + 1, end]`, where `mid` rounds down.
 *
 * @throws Error if the range is a single day
 *
 * @example
 * ```typescript
 * bisectRange({ start: '2024-01-01', end: '2024-01-31' });
 * // [{ start: '2024-01-01', end: '2024-01-16' }, { start: '2024-01-17', end: '2024-01-31' }]
 * ```
 */
export function bisectRange(range: DateRange): [DateRange, DateRange] {
  const span = daysBetween(range.start, range.end);
  if (span < 1) {
    throw new Error(`Cannot bisect single-day range ${range.start}`);
  }
  const mid = addDays(range.start, Math.floor(span / 2));
  return [
    { start: range.start, end: mid },
    { start: addDays(mid, 1), end: range.end },
  ];
}

/**
 * The collection window ending the day before `today`.
 *
 * @param today - Local date of the run
 * @param lookbackDays - Span to collect
 * @param bufferDays - Extra leading days so holidays at the edge are covered
 */
export function lookbackWindow(
  today: CalendarDate,
  lookbackDays: number,
  bufferDays: number
): DateRange {
  return dateRange(addDays(today, -(lookbackDays + bufferDays)), addDays(today, -1));
}

/**
 * Formats a range for logs, e.g. `2024-01-01..2024-01-31`.
 */
export function formatRange(range: DateRange): string {
  return `${range.start}..${range.end}`;
}
