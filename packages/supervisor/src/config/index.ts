/**
 * Configuration loading and management
 */

import type { RawConfig } from '@minutely/contracts';
import { ConfigError, applyOverrides, formatIssues, rawConfigFromEnv } from '@minutely/contracts';
import { configSchema, envMapping } from './schema.js';
import type { Config } from './schema.js';

/**
 * Load configuration from environment, flag overrides and defaults.
 *
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Record<string, unknown> = {}
): Config {
  const rawConfig: RawConfig = applyOverrides(rawConfigFromEnv(envMapping, env), overrides);

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  return result.data;
}

/**
 * Splits a configured command line on whitespace. Quoting is not supported;
 * pass arguments after `--` on the CLI for paths with spaces.
 */
export function splitCommand(commandLine: string): { command: string; args: string[] } {
  const [command = '', ...args] = commandLine.trim().split(/\s+/);
  return { command, args };
}

export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';
