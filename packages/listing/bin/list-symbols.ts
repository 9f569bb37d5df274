#!/usr/bin/env node
/**
 * Symbol-list CLI: scrapes both markets and writes the collector's input lists.
 */

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import {
  attachGlobalHandlers,
  createLogger,
  gracefulExit,
  startTimer,
} from '@minutely/logger';
import type { LogLevel } from '@minutely/logger';
import { HttpPageFetcher, MARKETS, collectMarket, writeListings } from '../src/index.js';

interface ListOptions {
  outDir: string;
  maxPages?: number;
  logLevel: LogLevel;
  json?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

function logLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new InvalidArgumentError(`must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

const program = new Command();

program
  .name('minutely-list-symbols')
  .description('Collect KOSPI and KOSDAQ listings into the CSV files the collector reads')
  .option('-o, --out-dir <dir>', 'output directory', process.env['COLLECTOR_META_DIR'] ?? 'split_meta_market')
  .option('--max-pages <n>', 'page cap per market', positiveInt)
  .option('--log-level <level>', 'error, warn, info or debug', logLevel, 'info')
  .option('--json', 'log as JSON lines')
  .action(async (options: ListOptions) => {
    const logger = createLogger({ level: options.logLevel, json: options.json ?? false });
    attachGlobalHandlers(logger);

    const timer = startTimer();
    const fetcher = new HttpPageFetcher({ logger: logger.child({ component: 'fetcher' }) });
    const collectLogger = logger.child({ component: 'listing' });
    const pageCap = options.maxPages !== undefined ? { maxPages: options.maxPages } : {};

    process.stdout.write('collecting KOSPI...\n');
    const kospi = await collectMarket(MARKETS.KOSPI, { fetcher, logger: collectLogger, ...pageCap });
    process.stdout.write(`  -> ${kospi.length} rows\n`);

    process.stdout.write('collecting KOSDAQ...\n');
    const kosdaq = await collectMarket(MARKETS.KOSDAQ, { fetcher, logger: collectLogger, ...pageCap });
    process.stdout.write(`  -> ${kosdaq.length} rows\n`);

    const written = await writeListings(options.outDir, kospi, kosdaq);
    process.stdout.write(`saved: ${written.combined}\n`);
    process.stdout.write(
      `total ${written.total} (KOSPI=${kospi.length}, KOSDAQ=${kosdaq.length})\n`
    );

    logger.info('Listing finished', { total: written.total, duration_ms: timer.stop() });
    gracefulExit(logger, 0);
  });

await program.parseAsync(process.argv);
