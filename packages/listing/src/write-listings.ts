import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { ListingRow } from './collect-market.js';
import { dedupeBySymbol } from './collect-market.js';

export const LISTING_FILES = {
  combined: 'naver_stock_list_yahoo_format.csv',
  kospi: 'yahoo_meta_kospi.csv',
  kosdaq: 'yahoo_meta_kosdaq.csv',
} as const;

export const LISTING_COLUMNS = ['code', 'market', 'name', 'YahooSymbol'] as const;

export interface WrittenListings {
  combined: string;
  kospi: string;
  kosdaq: string;
  total: number;
}

export function toListingCsv(rows: readonly ListingRow[]): string {
  return stringify(
    rows.map((row) => [row.code, row.market, row.name, row.yahooSymbol]),
    { header: true, columns: [...LISTING_COLUMNS], bom: true }
  );
}

/**
 * Writes the combined list and one list per market, UTF-8 with a BOM.
 */
export async function writeListings(
  outDir: string,
  kospi: readonly ListingRow[],
  kosdaq: readonly ListingRow[]
): Promise<WrittenListings> {
  await mkdir(outDir, { recursive: true });

  const combined = dedupeBySymbol([...kospi, ...kosdaq]);
  const paths = {
    combined: path.join(outDir, LISTING_FILES.combined),
    kospi: path.join(outDir, LISTING_FILES.kospi),
    kosdaq: path.join(outDir, LISTING_FILES.kosdaq),
  };

  await writeFile(paths.combined, toListingCsv(combined), 'utf8');
  await writeFile(paths.kospi, toListingCsv(kospi), 'utf8');
  await writeFile(paths.kosdaq, toListingCsv(kosdaq), 'utf8');

  return { ...paths, total: combined.length };
}
