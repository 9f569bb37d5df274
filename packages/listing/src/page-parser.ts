/**
 * @fileoverview Extracts instrument codes and names from one market-cap page.
 */

import * as cheerio from 'cheerio';

export interface ParsedPage {
  /** Six-digit codes in page order, possibly repeated */
  codes: string[];

  /** Display name per code, from the table's item links */
  names: Map<string, string>;
}

const CODE_PATTERN = /code=(\d{6})/g;

/**
 * Codes come from every `code=NNNNNN` occurrence in the markup; names from
 * the item title links.
 *
 * @example
 * ```typescript
 * const { codes, names } = parseMarketPage(html);
 * names.get('005930'); // 'Samsung Electronics'
 * ```
 */
export function parseMarketPage(html: string): ParsedPage {
  const codes = Array.from(html.matchAll(CODE_PATTERN), (match) => match[1] ?? '').filter(
    (code) => code.length === 6
  );

  const $ = cheerio.load(html);
  const names = new Map<string, string>();
  $('a.tltle').each((_, element) => {
    const href = $(element).attr('href') ?? '';
    const code = /code=(\d{6})/.exec(href)?.[1];
    const name = $(element).text().trim();
    if (code && name && !names.has(code)) {
      names.set(code, name);
    }
  });

  return { codes, names };
}
