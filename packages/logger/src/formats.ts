/**
 * @fileoverview Custom Winston formats for the collector logger.
 * Includes secret redaction, standard fields and single-line console output.
 */

import { format } from 'winston';

/**
 * Field-name patterns whose values never reach a log line.
 * Provider API keys travel through config objects that get logged at startup.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive keys replaced at any depth.
 *
 * @example
 * ```typescript
 * redactValue({ provider: { baseUrl: 'http://gw', apiKey: 'test-secret' } });
 * // { provider: { baseUrl: 'http://gw', apiKey: '[REDACTED]' } }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((entry) => redactValue(entry));
  }

  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    out[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(entry);
  }
  return out;
}

/**
 * Winston format that redacts sensitive metadata fields.
 * Applied first in the chain so secrets never reach a transport.
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * Adds an ISO timestamp and expands Error objects with their stacks.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Human-readable single-line output.
 *
 * @example
 * ```typescript
 * // [2025-01-15T09:12:04.120+09:00] info: Item collected component=orchestrator item=A005930 rows=72161
 * ```
 */
export const prettyPrint = format.printf((info) => {
  const { timestamp, level, message, component, item, stack, ...rest } = info;

  const context: string[] = [];
  if (component) context.push(`component=${String(component)}`);
  if (item) context.push(`item=${String(item)}`);

  for (const [key, value] of Object.entries(rest)) {
    if (key === 'splat') {
      continue;
    }
    context.push(`${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const line = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

  return stack ? `${line}\n${String(stack)}` : line;
});
