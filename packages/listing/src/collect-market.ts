/**
 * @fileoverview Pages through one market's listing until it runs dry.
 */

import { sleep as defaultSleep } from '@minutely/contracts';
import type { Sleep } from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import { createSilentLogger } from '@minutely/logger';
import type { PageFetcher } from './fetcher.js';
import type { Market, MarketSpec } from './markets.js';
import { MARKET_SUM_URL, pageUrl } from './markets.js';
import { parseMarketPage } from './page-parser.js';

export interface ListingRow {
  code: string;
  market: Market;
  name: string;
  yahooSymbol: string;
}

export interface CollectMarketOptions {
  fetcher: PageFetcher;

  /** Overrides the market's own page cap */
  maxPages?: number;

  /** Pause after each page */
  sleepMs?: number;

  /** Consecutive pages without a new code that end the scan */
  emptyTolerance?: number;

  baseUrl?: string;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Collects every listed code of a market, in first-seen order.
 *
 * Names are taken from the item links; a code seen only elsewhere on the page
 * gets an empty name.
 *
 * @example
 * ```typescript
 * const rows = await collectMarket(MARKETS.KOSPI, { fetcher: new HttpPageFetcher() });
 * rows[0]; // { code: '005930', market: 'KOSPI', name: '...', yahooSymbol: '005930.KS' }
 * ```
 */
export async function collectMarket(
  spec: MarketSpec,
  options: CollectMarketOptions
): Promise<ListingRow[]> {
  const {
    fetcher,
    maxPages = spec.maxPages,
    sleepMs = 150,
    emptyTolerance = 5,
    baseUrl = MARKET_SUM_URL,
    sleep = defaultSleep,
  } = options;
  const logger = (options.logger ?? createSilentLogger()).child({ market: spec.market });

  const order: string[] = [];
  const seen = new Set<string>();
  const names = new Map<string, string>();
  let idlePages = 0;
  let page = 1;

  for (; page <= maxPages; page++) {
    const parsed = parseMarketPage(await fetcher.fetchPage(pageUrl(spec, page, baseUrl)));

    for (const [code, name] of parsed.names) {
      names.set(code, name);
    }

    const fresh = parsed.codes.filter((code) => !seen.has(code));
    if (fresh.length === 0) {
      idlePages++;
      if (idlePages >= emptyTolerance) {
        logger.debug('No new codes, stopping', { page, idle_pages: idlePages });
        break;
      }
    } else {
      idlePages = 0;
    }

    for (const code of fresh) {
      if (!seen.has(code)) {
        seen.add(code);
        order.push(code);
      }
    }

    await sleep(sleepMs);
  }

  logger.info('Market collected', { pages: Math.min(page, maxPages), codes: order.length });

  return dedupeBySymbol(
    order.map((code) => ({
      code,
      market: spec.market,
      name: names.get(code) ?? '',
      yahooSymbol: `${code}${spec.yahooSuffix}`,
    }))
  );
}

/**
 * Keeps the first row per Yahoo symbol.
 */
export function dedupeBySymbol(rows: readonly ListingRow[]): ListingRow[] {
  const seen = new Set<string>();
  return rows.filter((row) => {
    if (seen.has(row.yahooSymbol)) {
      return false;
    }
    seen.add(row.yahooSymbol);
    return true;
  });
}
