/**
 * @fileoverview Helpers for turning environment variables into a raw config tree.
 *
 * Each package owns its zod schema; this module only maps flat env vars onto
 * dotted config paths and formats validation issues for humans.
 *
 * @module @minutely/contracts/env
 */

/**
 * Maps an environment variable name to a dotted config path.
 *
 * @example
 * ```typescript
 * const mapping: EnvMapping = { LOG_LEVEL: 'logging.level' };
 * ```
 */
export type EnvMapping = Record<string, string>;

/**
 * Nested plain-object tree of raw (unvalidated) config values.
 */
export interface RawConfig {
  [key: string]: unknown;
}

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sets `value` at a dotted `path`, creating intermediate objects.
 */
export function setNestedValue(target: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.').filter((key) => key.length > 0);
  const last = keys.pop();
  if (last === undefined) {
    return;
  }

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRawConfig(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Builds a raw config tree from the mapped environment variables that are set.
 * Values stay strings; the schema coerces them.
 */
export function rawConfigFromEnv(
  mapping: EnvMapping,
  env: Record<string, string | undefined>
): RawConfig {
  const raw: RawConfig = {};
  for (const [envKey, configPath] of Object.entries(mapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedValue(raw, configPath, value);
    }
  }
  return raw;
}

/**
 * Applies already-typed overrides (e.g. CLI flags) on top of a raw tree.
 * Undefined overrides are ignored.
 */
export function applyOverrides(raw: RawConfig, overrides: Record<string, unknown>): RawConfig {
  for (const [configPath, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      setNestedValue(raw, configPath, value);
    }
  }
  return raw;
}

/**
 * Formats schema issues as `path: message` lines.
 */
export function formatIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>
): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
