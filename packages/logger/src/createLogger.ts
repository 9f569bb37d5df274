/**
 * @fileoverview Main logger factory for the collector and supervisor.
 * Creates configured Winston logger instances with structured logging,
 * secret redaction and flexible transports.
 */

import path from 'node:path';
import winston, { format } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import type { LoggerConfig, Logger, LogLevel } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

const ALL_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a configured logger instance.
 *
 * Features:
 * - Structured logging with standard fields (timestamp, level, message)
 * - Automatic redaction of secret-looking fields (apiKey, token, ...)
 * - Console output on stderr only, so stdout carries nothing but progress lines
 * - Optional file or daily-rotating file transport for unattended runs
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: false });
 * logger.info('Run started', { total: 2677 });
 * ```
 *
 * @example
 * ```typescript
 * // Long unattended batch with rotating files
 * const logger = createLogger({
 *   level: 'debug',
 *   filePath: './logs/collector.log',
 *   rotate: true,
 * });
 *
 * const fetchLogger = logger.child({ component: 'fetcher' });
 * fetchLogger.debug('Chunk requested', { item: 'A005930', from: 20250101, to: 20250131 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    rotate = false,
    console: enableConsole = true,
  } = config;

  // Order matters: redact first, then stamp, then render
  const baseFormat = format.combine(redactSecrets(), standardFields);
  const fileFormat = format.combine(baseFormat, json ? format.json() : prettyPrint);
  const consoleFormat = json
    ? fileFormat
    : format.combine(baseFormat, format.colorize(), prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: consoleFormat,
        stderrLevels: ALL_LEVELS,
      })
    );
  }

  if (filePath && rotate) {
    const parsed = path.parse(filePath);
    transports.push(
      new DailyRotateFile({
        dirname: parsed.dir || '.',
        filename: `${parsed.name}-%DATE%${parsed.ext || '.log'}`,
        datePattern: 'YYYY-MM-DD',
        maxFiles: '14d',
        maxSize: '50m',
        level,
        format: fileFormat,
      })
    );
  } else if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: fileFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    transports,
    // Fatal errors are handled explicitly in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * A logger that discards everything. Used as the default collaborator in
 * components constructed without one (tests, library use).
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}
