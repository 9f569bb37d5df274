/**
 * Configuration loading and management
 */

import type { RawConfig } from '@minutely/contracts';
import { ConfigError, applyOverrides, formatIssues, rawConfigFromEnv } from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import { configSchema, envMapping } from './schema.js';
import type { Config } from './schema.js';

/**
 * Load configuration from environment, flag overrides and defaults.
 *
 * @param env - Usually `process.env` after `dotenv/config`
 * @param overrides - Dotted config paths to values, e.g. from CLI flags
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Record<string, unknown> = {},
  logger?: Logger
): Config {
  const rawConfig: RawConfig = applyOverrides(rawConfigFromEnv(envMapping, env), overrides);

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    provider: config.provider.type,
    outDir: config.collector.outDir,
    checkpoint: config.collector.checkpointPath,
    lookbackDays: config.collector.lookbackDays,
    rate: `${config.rate.maxCalls}/${config.rate.windowMs}ms`,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
    },
  };
}

export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';
