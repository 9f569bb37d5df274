/**
 * @fileoverview Main entry point for @minutely/listing package.
 *
 * Builds the per-market symbol lists the collector reads as its work list.
 *
 * @module @minutely/listing
 */

export type { Market, MarketSpec } from './markets.js';
export { MARKETS, MARKET_SUM_URL, pageUrl } from './markets.js';

export type { ParsedPage } from './page-parser.js';
export { parseMarketPage } from './page-parser.js';

export type { PageFetcher, BinaryGetter, HttpPageFetcherOptions } from './fetcher.js';
export { HttpPageFetcher } from './fetcher.js';

export type { ListingRow, CollectMarketOptions } from './collect-market.js';
export { collectMarket, dedupeBySymbol } from './collect-market.js';

export type { WrittenListings } from './write-listings.js';
export { LISTING_FILES, LISTING_COLUMNS, toListingCsv, writeListings } from './write-listings.js';
