#!/usr/bin/env node
/**
 * Collector CLI: one full pass over the work list, resuming from the
 * checkpoint. Progress lines go to stdout, logs to stderr.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { isConfigError } from '@minutely/contracts';
import {
  attachGlobalHandlers,
  createLogger,
  gracefulExit,
  loggerConfigFrom,
  startTimer,
} from '@minutely/logger';
import { createCollectorApp, loadConfig } from '../src/index.js';
import type { Config } from '../src/index.js';

interface CollectOptions {
  outDir?: string;
  checkpoint?: string;
  metaDir?: string;
  provider?: string;
  baseUrl?: string;
  fixtureDir?: string;
  lookbackDays?: string;
  itemDelay?: string;
  logLevel?: string;
  json?: boolean;
}

const program = new Command();

program
  .name('minutely-collect')
  .description('Collect two years of one-minute bars per instrument into CSV files')
  .option('-o, --out-dir <dir>', 'output directory for per-item CSV files')
  .option('-c, --checkpoint <file>', 'checkpoint file')
  .option('-m, --meta-dir <dir>', 'directory holding the symbol list CSVs')
  .option('-p, --provider <type>', 'provider type (http or fixture)')
  .option('--base-url <url>', 'gateway base URL for the http provider')
  .option('--fixture-dir <dir>', 'fixture directory for the fixture provider')
  .option('--lookback-days <days>', 'days of history to collect')
  .option('--item-delay <ms>', 'pause after each collected item')
  .option('--log-level <level>', 'error, warn, info or debug')
  .option('--json', 'log as JSON lines')
  .action(async (options: CollectOptions) => {
    let config: Config;
    try {
      config = loadConfig(process.env, {
        'collector.outDir': options.outDir,
        'collector.checkpointPath': options.checkpoint,
        'collector.metaDir': options.metaDir,
        'collector.lookbackDays': options.lookbackDays,
        'collector.itemDelayMs': options.itemDelay,
        'provider.type': options.provider,
        'provider.baseUrl': options.baseUrl,
        'provider.fixtureDir': options.fixtureDir,
        'logging.level': options.logLevel,
        'logging.format': options.json ? 'json' : undefined,
      });
    } catch (error) {
      if (isConfigError(error)) {
        process.stderr.write(`Invalid configuration:\n  ${error.issues.join('\n  ')}\n`);
        process.exit(1);
      }
      throw error;
    }

    const logger = createLogger(loggerConfigFrom(config.logging));
    attachGlobalHandlers(logger);

    const timer = startTimer();
    logger.info('Collector starting', {
      provider: config.provider.type,
      out_dir: config.collector.outDir,
      checkpoint: config.collector.checkpointPath,
    });

    const summary = await createCollectorApp(config, logger).run();

    logger.info('Collector finished', { ...summary, duration_ms: timer.stop() });
    gracefulExit(logger, 0);
  });

await program.parseAsync(process.argv);
