/**
 * @fileoverview Symbol normalization to the provider's instrument codes.
 */

import type { WorkItem } from '@minutely/contracts';

const PARENTHESIZED_DIGITS = /\((\d+)\)/;
const MARKET_SUFFIX = /\.(KS|KQ)$/;

/**
 * Normalizes a listing value (`005930`, `005930.KS`, `Samsung (005930)`)
 * to the provider code form `A005930`.
 *
 * @returns The code, or undefined when the value holds no digits
 *
 * @example
 * ```typescript
 * toProviderCode('5930.ks');          // 'A005930'
 * toProviderCode('Samsung (005930)'); // 'A005930'
 * toProviderCode('N/A');              // undefined
 * ```
 */
export function toProviderCode(value: string): WorkItem | undefined {
  const normalized = value.trim().toUpperCase();

  const grouped = PARENTHESIZED_DIGITS.exec(normalized);
  const digits = grouped?.[1] ?? normalized.replace(MARKET_SUFFIX, '').replace(/\D/g, '');

  if (digits.length === 0) {
    return undefined;
  }
  return `A${digits.padStart(6, '0')}`;
}
