/**
 * @minutely/collector
 *
 * Checkpointed, rate-limited collection of minute bars, one CSV artifact per
 * work item.
 */

export { RateLimiter } from './rate-limiter.js';
export type { RateLimiterOptions, RateLimiterStats } from './rate-limiter.js';

export { DEFAULT_GRANULARITY, isFineGrained } from './granularity.js';
export type { GranularityOptions } from './granularity.js';

export { normalizeBarSet } from './bar-set.js';

export { RangeFetcher } from './range-fetcher.js';
export type { RangeFetcherOptions, ItemCollector } from './range-fetcher.js';

export { CheckpointStore } from './checkpoint-store.js';
export { BarStore, BAR_COLUMNS } from './bar-store.js';
export type { ArtifactStore } from './bar-store.js';
export { writeFileAtomic } from './atomic-write.js';

export { toProviderCode } from './codes.js';
export {
  CsvWorkItemSource,
  DEFAULT_LIST_FILES,
  SYMBOL_COLUMNS,
  pickSymbolColumn,
} from './work-items.js';
export type { CsvWorkItemSourceOptions } from './work-items.js';

export {
  ProgressReporter,
  formatStartLine,
  formatSkipLine,
  formatSavedLine,
} from './progress.js';
export type { LineSink } from './progress.js';

export { Orchestrator } from './orchestrator.js';
export type { OrchestratorOptions, RunSummary } from './orchestrator.js';

export { createProvider, FixtureChunkProvider, HttpChunkProvider } from './providers/index.js';
export type { HttpChunkProviderOptions, HttpGetter } from './providers/index.js';

export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';

export { createCollectorApp } from './app.js';
export type { CollectorAppOptions } from './app.js';
