/**
 * @fileoverview Main entry point for @minutely/contracts package.
 *
 * Exports the shared data model, calendar-date arithmetic and error taxonomy
 * used by the collector, the supervisor and the listing tools.
 *
 * @module @minutely/contracts
 */

// Market data types
export type { WorkItem, Bar, Checkpoint, QuotaStatus, ChunkProvider, WorkItemSource } from './market.js';

// Calendar dates and ranges
export type { CalendarDate, DateRange } from './dates.js';

export {
  isCalendarDate,
  calendarDateOf,
  addDays,
  daysBetween,
  dayCount,
  toYmd,
  fromYmd,
  dateRange,
  monthChunks,
  bisectRange,
  lookbackWindow,
  formatRange,
} from './dates.js';

// Time sources
export type { Clock, Sleep } from './timing.js';
export { systemClock, sleep } from './timing.js';

// Retry policy
export type { FailureKind, RetryPolicy } from './retry.js';
export { DEFAULT_RETRY_POLICY, retryDelay } from './retry.js';

// Environment-driven configuration helpers
export type { EnvMapping, RawConfig } from './env.js';
export { setNestedValue, rawConfigFromEnv, applyOverrides, formatIssues } from './env.js';

// Error classes and guards
export {
  CollectorError,
  ProviderRateLimitError,
  ProviderRequestError,
  ProviderParseError,
  CheckpointError,
  ConfigError,
  isCollectorError,
  isProviderRateLimitError,
  isProviderRequestError,
  isProviderParseError,
  isConfigError,
  errorMessage,
} from './errors.js';
