/**
 * @fileoverview The `logging` config section shared by every CLI.
 */

import { z } from 'zod';
import type { LoggerConfig } from './types.js';

const envBoolean = z.preprocess(
  (value) => (value === 'true' ? true : value === 'false' ? false : value),
  z.boolean()
);

export const loggingConfigSchema = z
  .object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    format: z.enum(['json', 'pretty']).default('pretty'),
    filePath: z.string().optional(),
    rotate: envBoolean.default(false),
  })
  .default({});

export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

/**
 * Environment variables for the logging section.
 */
export const loggingEnvMapping: Record<string, string> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  LOG_ROTATE: 'logging.rotate',
};

/**
 * Logger settings for a validated logging section.
 */
export function loggerConfigFrom(logging: LoggingConfig): LoggerConfig {
  return {
    level: logging.level,
    json: logging.format === 'json',
    rotate: logging.rotate,
    ...(logging.filePath ? { filePath: logging.filePath } : {}),
  };
}
