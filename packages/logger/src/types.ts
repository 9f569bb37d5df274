/**
 * @fileoverview Type definitions for the collector logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures that need attention (item failures, child crashes)
 * - 'warn': Degraded conditions (unreadable checkpoint, timeouts, restarts)
 * - 'info': Normal progress (run start, item collected, summary)
 * - 'debug': Per-request detail (chunk requests, limiter waits)
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: false,
 *   filePath: './logs/collector.log',
 *   rotate: true
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON
   * - false: Human-readable single-line output
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for file transport.
   * With `rotate`, the path's file name gets a `-%DATE%` suffix before its extension.
   */
  filePath?: string;

  /**
   * Rotate the log file daily instead of appending to one file forever.
   * Only used together with `filePath`.
   * @default false
   */
  rotate?: boolean;

  /**
   * Whether to enable console output.
   * Console output always goes to stderr: stdout is reserved for the
   * progress lines the supervisor reads.
   * @default true
   */
  console?: boolean;
}

/**
 * Winston's Logger, re-exported so packages never import winston directly.
 */
export type Logger = WinstonLogger;
