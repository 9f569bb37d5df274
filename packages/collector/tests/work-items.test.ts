import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { toProviderCode } from '../src/codes.js';
import { CsvWorkItemSource, pickSymbolColumn } from '../src/work-items.js';

describe('toProviderCode', () => {
  it('should pad plain codes', () => {
    expect(toProviderCode('005930')).toBe('A005930');
    expect(toProviderCode('5930')).toBe('A005930');
  });

  it('should strip market suffixes in any case', () => {
    expect(toProviderCode('035720.KQ')).toBe('A035720');
    expect(toProviderCode(' 5930.ks ')).toBe('A005930');
  });

  it('should prefer a parenthesized code', () => {
    expect(toProviderCode('Samsung Elec (005930)')).toBe('A005930');
  });

  it('should reject values without digits', () => {
    expect(toProviderCode('N/A')).toBeUndefined();
    expect(toProviderCode('')).toBeUndefined();
  });
});

describe('pickSymbolColumn', () => {
  it('should prefer known names in order', () => {
    expect(pickSymbolColumn(['name', 'YahooSymbol', 'code'])).toBe('code');
    expect(pickSymbolColumn(['name', 'Ticker'])).toBe('Ticker');
  });

  it('should fall back to the first column', () => {
    expect(pickSymbolColumn(['isin', 'name'])).toBe('isin');
    expect(pickSymbolColumn([])).toBeUndefined();
  });
});

describe('CsvWorkItemSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'minutely-items-'));
    await writeFile(
      path.join(dir, 'yahoo_meta_kospi.csv'),
      '\ufeffcode,market,name,YahooSymbol\n005930,KOSPI,Samsung,005930.KS\n000660,KOSPI,Hynix,000660.KS\n'
    );
    await writeFile(
      path.join(dir, 'yahoo_meta_kosdaq.csv'),
      'YahooSymbol,name\n035720.KQ,Kakao\n005930.KS,Duplicate\nN/A,Broken\n'
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should merge, deduplicate and sort both lists', async () => {
    const source = new CsvWorkItemSource({ metaDir: dir });
    await expect(source.listItems()).resolves.toEqual(['A000660', 'A005930', 'A035720']);
  });

  it('should drop items the provider rejects', async () => {
    const source = new CsvWorkItemSource({
      metaDir: dir,
      provider: { isValidItem: async (item) => item !== 'A000660' },
    });
    await expect(source.listItems()).resolves.toEqual(['A005930', 'A035720']);
  });

  it('should exclude items whose validation throws', async () => {
    const source = new CsvWorkItemSource({
      metaDir: dir,
      provider: {
        isValidItem: async (item) => {
          if (item === 'A035720') {
            throw new Error('gateway timeout');
          }
          return true;
        },
      },
    });
    await expect(source.listItems()).resolves.toEqual(['A000660', 'A005930']);
  });

  it('should treat a missing list as empty', async () => {
    const source = new CsvWorkItemSource({
      metaDir: dir,
      files: ['yahoo_meta_kosdaq.csv', 'missing.csv'],
    });
    await expect(source.listItems()).resolves.toEqual(['A005930', 'A035720']);
  });
});
