/**
 * @fileoverview Wires a validated config into a runnable orchestrator.
 */

import type { ChunkProvider, Clock, Sleep } from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import { BarStore } from './bar-store.js';
import { CheckpointStore } from './checkpoint-store.js';
import type { Config } from './config/index.js';
import { Orchestrator } from './orchestrator.js';
import { ProgressReporter } from './progress.js';
import type { LineSink } from './progress.js';
import { createProvider } from './providers/index.js';
import { RangeFetcher } from './range-fetcher.js';
import { RateLimiter } from './rate-limiter.js';
import { CsvWorkItemSource } from './work-items.js';

export interface CollectorAppOptions {
  /** Replaces the provider selected by config */
  provider?: ChunkProvider;

  /** Where progress lines go (default stdout) */
  out?: LineSink;

  clock?: Clock;
  sleep?: Sleep;
}

/**
 * Builds the orchestrator and its collaborators.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const logger = createLogger(loggerConfigFrom(config.logging));
 * const summary = await createCollectorApp(config, logger).run();
 * ```
 */
export function createCollectorApp(
  config: Config,
  logger: Logger,
  options: CollectorAppOptions = {}
): Orchestrator {
  const provider = options.provider ?? createProvider(config.provider, logger);
  const timing = { clock: options.clock, sleep: options.sleep };

  const limiter = new RateLimiter({
    maxCalls: config.rate.maxCalls,
    windowMs: config.rate.windowMs,
    logger: logger.child({ component: 'rate-limiter' }),
    quotaProbe: provider.remainingQuota?.bind(provider),
    ...timing,
  });

  const fetcher = new RangeFetcher({
    provider,
    limiter,
    maxAttempts: config.collector.maxAttempts,
    lookbackDays: config.collector.lookbackDays,
    bufferDays: config.collector.bufferDays,
    logger: logger.child({ component: 'fetcher' }),
    ...timing,
  });

  return new Orchestrator({
    source: new CsvWorkItemSource({
      metaDir: config.collector.metaDir,
      provider,
      logger: logger.child({ component: 'work-items' }),
    }),
    collector: fetcher,
    store: new BarStore(config.collector.outDir, config.collector.artifactSuffix),
    checkpoints: new CheckpointStore(
      config.collector.checkpointPath,
      logger.child({ component: 'checkpoint' })
    ),
    reporter: new ProgressReporter(options.out),
    itemDelayMs: config.collector.itemDelayMs,
    logger: logger.child({ component: 'orchestrator' }),
    itemName: provider.itemName?.bind(provider),
    sleep: options.sleep,
  });
}
