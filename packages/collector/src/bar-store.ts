/**
 * @fileoverview Per-item CSV artifacts.
 *
 * One file per work item holds its collected bars. A non-empty file is the
 * signal that the item is done.
 */

import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { Bar, WorkItem } from '@minutely/contracts';
import { writeFileAtomic } from './atomic-write.js';

export const BAR_COLUMNS = ['date', 'time', 'open', 'high', 'low', 'close', 'volume'] as const;

const barRowSchema = z.object({
  date: z.coerce.number().int(),
  time: z.coerce.number().int(),
  open: z.coerce.number(),
  high: z.coerce.number(),
  low: z.coerce.number(),
  close: z.coerce.number(),
  volume: z.coerce.number(),
});

/**
 * Where and whether a work item's artifact exists.
 */
export interface ArtifactStore {
  exists(item: WorkItem): Promise<boolean>;
  write(item: WorkItem, bars: readonly Bar[]): Promise<string>;
}

export class BarStore implements ArtifactStore {
  constructor(
    readonly outDir: string,
    private readonly suffix = '_1min_2y.csv'
  ) {}

  pathFor(item: WorkItem): string {
    return path.join(this.outDir, `${item}${this.suffix}`);
  }

  async exists(item: WorkItem): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(item));
      return info.isFile() && info.size > 0;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Writes the artifact atomically and returns its path.
   */
  async write(item: WorkItem, bars: readonly Bar[]): Promise<string> {
    const filePath = this.pathFor(item);
    const content = stringify(
      bars.map((bar) => BAR_COLUMNS.map((column) => bar[column])),
      { header: true, columns: [...BAR_COLUMNS] }
    );
    await writeFileAtomic(filePath, content);
    return filePath;
  }

  async read(item: WorkItem): Promise<Bar[]> {
    const content = await readFile(this.pathFor(item), 'utf8');
    const records: unknown = parse(content, { columns: true, skip_empty_lines: true });
    return z.array(barRowSchema).parse(records);
  }
}
