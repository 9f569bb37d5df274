#!/usr/bin/env node
/**
 * Supervisor CLI. Runs the collector (or the command after `--`) and
 * restarts it whenever it stalls on an item or exits early.
 */

import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { isConfigError } from '@minutely/contracts';
import {
  attachGlobalHandlers,
  createLogger,
  gracefulExit,
  loggerConfigFrom,
  startTimer,
} from '@minutely/logger';
import {
  EXIT_CODES,
  Supervisor,
  createExecaLauncher,
  loadConfig,
  splitCommand,
} from '../src/index.js';
import type { CommandSpec, Config } from '../src/index.js';

interface SuperviseOptions {
  timeout?: string;
  restartDelay?: string;
  maxRestarts?: string;
  poll?: string;
  logLevel?: string;
  json?: boolean;
}

const collectorEntry = fileURLToPath(new URL('../../collector/bin/collect.ts', import.meta.url));

function commandFor(config: Config, argv: string[]): CommandSpec {
  const [command, ...args] = argv;
  if (command !== undefined) {
    return { command, args };
  }
  if (config.supervisor.command) {
    return splitCommand(config.supervisor.command);
  }
  return { command: process.execPath, args: ['--import', 'tsx', collectorEntry] };
}

const program = new Command();

program
  .name('minutely-supervise')
  .description('Run the collector under a watchdog that restarts it on stalls and crashes')
  .argument('[command...]', 'command to supervise instead of the collector')
  .option('-t, --timeout <ms>', 'longest an item may take before the child is killed')
  .option('-d, --restart-delay <ms>', 'pause before relaunching')
  .option('-r, --max-restarts <n>', 'give up after this many restarts (0 = never)')
  .option('--poll <ms>', 'longest wait for output before re-checking the timer')
  .option('--log-level <level>', 'error, warn, info or debug')
  .option('--json', 'log as JSON lines')
  .action(async (commandArgs: string[], options: SuperviseOptions) => {
    let config: Config;
    try {
      config = loadConfig(process.env, {
        'supervisor.timeoutMs': options.timeout,
        'supervisor.restartDelayMs': options.restartDelay,
        'supervisor.maxRestarts': options.maxRestarts,
        'supervisor.pollMs': options.poll,
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

    const controller = new AbortController();
    const interrupt = (signal: NodeJS.Signals): void => {
      logger.warn('Interrupt received', { signal });
      controller.abort();
    };
    process.once('SIGINT', interrupt);
    process.once('SIGTERM', interrupt);

    const spec = commandFor(config, commandArgs);
    logger.info('Supervisor starting', {
      command: [spec.command, ...spec.args].join(' '),
      timeout_ms: config.supervisor.timeoutMs,
      max_restarts: config.supervisor.maxRestarts,
    });

    const timer = startTimer();
    const { timeoutMs, restartDelayMs, maxRestarts, pollMs, graceMs, exitWaitMs } = config.supervisor;
    const supervisor = new Supervisor({
      launch: createExecaLauncher(spec),
      timeoutMs,
      restartDelayMs,
      maxRestarts,
      pollMs,
      graceMs,
      exitWaitMs,
      logger: logger.child({ component: 'supervisor' }),
    });
    const outcome = await supervisor.run(controller.signal);

    logger.info('Supervisor finished', { ...outcome, duration_ms: timer.stop() });
    gracefulExit(logger, EXIT_CODES[outcome.status]);
  });

await program.parseAsync(process.argv);
