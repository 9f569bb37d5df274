/**
 * @fileoverview Work list built from per-market symbol CSVs.
 *
 * @module @minutely/collector/work-items
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { ChunkProvider, WorkItem, WorkItemSource } from '@minutely/contracts';
import { errorMessage } from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import { createSilentLogger } from '@minutely/logger';
import { toProviderCode } from './codes.js';

/** Header names tried in order when picking the symbol column. */
export const SYMBOL_COLUMNS = [
  'code',
  'Code',
  'symbol',
  'Symbol',
  'ticker',
  'Ticker',
  'YahooSymbol',
] as const;

export const DEFAULT_LIST_FILES = ['yahoo_meta_kospi.csv', 'yahoo_meta_kosdaq.csv'] as const;

const recordsSchema = z.array(z.record(z.string()));

export interface CsvWorkItemSourceOptions {
  /** Directory holding the list files */
  metaDir: string;

  /** File names inside `metaDir` */
  files?: readonly string[];

  /** Used to drop items the provider does not know */
  provider?: Pick<ChunkProvider, 'isValidItem'>;

  logger?: Logger;
}

/**
 * Picks the symbol column of a header row.
 */
export function pickSymbolColumn(headers: readonly string[]): string | undefined {
  return SYMBOL_COLUMNS.find((name) => headers.includes(name)) ?? headers[0];
}

/**
 * Reads symbol lists and turns them into a deduplicated, sorted work list.
 *
 * @example
 * ```typescript
 * const source = new CsvWorkItemSource({ metaDir: 'split_meta_market', provider });
 * const items = await source.listItems(); // ['A000020', 'A000040', ...]
 * ```
 */
export class CsvWorkItemSource implements WorkItemSource {
  private readonly files: readonly string[];
  private readonly logger: Logger;

  constructor(private readonly options: CsvWorkItemSourceOptions) {
    this.files = options.files ?? DEFAULT_LIST_FILES;
    this.logger = options.logger ?? createSilentLogger();
  }

  async listItems(): Promise<WorkItem[]> {
    const candidates = new Set<WorkItem>();

    for (const file of this.files) {
      const codes = await this.readCodes(path.join(this.options.metaDir, file));
      for (const code of codes) {
        candidates.add(code);
      }
    }

    const valid: WorkItem[] = [];
    for (const item of candidates) {
      if (await this.isValid(item)) {
        valid.push(item);
      }
    }

    valid.sort();
    this.logger.info('Work list built', {
      candidates: candidates.size,
      items: valid.length,
    });
    return valid;
  }

  private async readCodes(filePath: string): Promise<WorkItem[]> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (error) {
      this.logger.warn('Symbol list unavailable', { path: filePath, error: errorMessage(error) });
      return [];
    }

    const records = recordsSchema.parse(
      parse(content, { columns: true, bom: true, skip_empty_lines: true, trim: true })
    );
    const first = records[0];
    if (!first) {
      return [];
    }

    const column = pickSymbolColumn(Object.keys(first));
    if (column === undefined) {
      return [];
    }

    const codes: WorkItem[] = [];
    for (const record of records) {
      const code = toProviderCode(record[column] ?? '');
      if (code !== undefined) {
        codes.push(code);
      }
    }
    return codes;
  }

  private async isValid(item: WorkItem): Promise<boolean> {
    const provider = this.options.provider;
    if (!provider?.isValidItem) {
      return true;
    }
    try {
      return await provider.isValidItem(item);
    } catch (error) {
      this.logger.warn('Item validation failed, excluding', { item, error: errorMessage(error) });
      return false;
    }
  }
}
