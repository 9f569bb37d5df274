/**
 * @fileoverview Chunk provider that serves bars from local JSON files.
 *
 * Each item lives in `<fixtureDir>/<item>.json` as
 * `{ "name": "...", "bars": [{ "date": 20250102, "time": 901, ... }] }`.
 * Used for dry runs of the whole pipeline without a gateway.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { Bar, ChunkProvider, WorkItem } from '@minutely/contracts';
import { ProviderParseError, errorMessage } from '@minutely/contracts';

const fixtureSchema = z.object({
  name: z.string().default(''),
  bars: z.array(
    z.object({
      date: z.number().int(),
      time: z.number().int(),
      open: z.number(),
      high: z.number(),
      low: z.number(),
      close: z.number(),
      volume: z.number(),
    })
  ),
});

type Fixture = z.infer<typeof fixtureSchema>;

export class FixtureChunkProvider implements ChunkProvider {
  readonly name = 'fixture';

  private readonly cache = new Map<WorkItem, Fixture | undefined>();

  constructor(private readonly fixtureDir: string) {}

  async requestChunk(item: WorkItem, fromYmd: number, toYmd: number): Promise<Bar[]> {
    const fixture = await this.load(item);
    if (!fixture) {
      return [];
    }
    return fixture.bars.filter((bar) => bar.date >= fromYmd && bar.date <= toYmd);
  }

  async isValidItem(item: WorkItem): Promise<boolean> {
    return (await this.load(item)) !== undefined;
  }

  async itemName(item: WorkItem): Promise<string> {
    return (await this.load(item))?.name ?? '';
  }

  private async load(item: WorkItem): Promise<Fixture | undefined> {
    if (this.cache.has(item)) {
      return this.cache.get(item);
    }

    const filePath = path.join(this.fixtureDir, `${item}.json`);
    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.cache.set(item, undefined);
        return undefined;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ProviderParseError(`Fixture ${filePath} is not valid JSON`, {
        provider: this.name,
        path: filePath,
        cause: errorMessage(error),
      });
    }

    const result = fixtureSchema.safeParse(parsed);
    if (!result.success) {
      throw new ProviderParseError(`Fixture ${filePath} has unexpected shape`, {
        provider: this.name,
        path: filePath,
      });
    }

    this.cache.set(item, result.data);
    return result.data;
  }
}
