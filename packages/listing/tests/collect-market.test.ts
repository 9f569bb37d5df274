import { describe, it, expect, vi } from 'vitest';
import type { Sleep } from '@minutely/contracts';
import { collectMarket, dedupeBySymbol } from '../src/collect-market.js';
import type { PageFetcher } from '../src/fetcher.js';
import { MARKETS } from '../src/markets.js';

function listing(...entries: Array<[string, string]>): string {
  return entries
    .map(([code, name]) => `<a class="tltle" href="/item/main.naver?code=${code}">${name}</a>`)
    .join('\n');
}

function fakeFetcher(pages: Record<number, string>) {
  return vi.fn<PageFetcher['fetchPage']>(async (url) => {
    const page = Number(new URL(url).searchParams.get('page'));
    return pages[page] ?? '<p>empty</p>';
  });
}

const PAGES: Record<number, string> = {
  1: listing(['000001', 'One'], ['000002', 'Two']),
  2: listing(['000002', 'Two'], ['000003', 'Three']),
  3: listing(['000003', 'Three']),
};

describe('collectMarket', () => {
  it('should stop after the tolerated run of pages without new codes', async () => {
    const fetchPage = fakeFetcher(PAGES);
    const sleep = vi.fn<Sleep>(async () => undefined);

    const rows = await collectMarket(MARKETS.KOSPI, {
      fetcher: { fetchPage },
      emptyTolerance: 2,
      baseUrl: 'http://pages.test/sum',
      sleep,
    });

    expect(rows).toEqual([
      { code: '000001', market: 'KOSPI', name: 'One', yahooSymbol: '000001.KS' },
      { code: '000002', market: 'KOSPI', name: 'Two', yahooSymbol: '000002.KS' },
      { code: '000003', market: 'KOSPI', name: 'Three', yahooSymbol: '000003.KS' },
    ]);
    expect(fetchPage).toHaveBeenCalledTimes(4);
    expect(fetchPage).toHaveBeenLastCalledWith('http://pages.test/sum?sosok=0&page=4');
    expect(sleep.mock.calls).toEqual([[150], [150], [150]]);
  });

  it('should stop at the page cap', async () => {
    const fetchPage = fakeFetcher(PAGES);

    const rows = await collectMarket(MARKETS.KOSDAQ, {
      fetcher: { fetchPage },
      maxPages: 1,
      sleepMs: 0,
      sleep: async () => undefined,
    });

    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(rows.map((row) => row.yahooSymbol)).toEqual(['000001.KQ', '000002.KQ']);
  });

  it('should leave the name empty for codes without a title link', async () => {
    const fetchPage = fakeFetcher({ 1: '<a href="/item/main.naver?code=000009">x</a>' });

    const rows = await collectMarket(MARKETS.KOSPI, {
      fetcher: { fetchPage },
      emptyTolerance: 1,
      sleep: async () => undefined,
    });

    expect(rows).toEqual([{ code: '000009', market: 'KOSPI', name: '', yahooSymbol: '000009.KS' }]);
  });

  it('should propagate fetch failures', async () => {
    const fetchPage = vi.fn<PageFetcher['fetchPage']>().mockRejectedValue(new Error('offline'));

    await expect(
      collectMarket(MARKETS.KOSPI, { fetcher: { fetchPage }, sleep: async () => undefined })
    ).rejects.toThrow('offline');
  });
});

describe('dedupeBySymbol', () => {
  it('should keep the first row per symbol', () => {
    expect(
      dedupeBySymbol([
        { code: '000001', market: 'KOSPI', name: 'First', yahooSymbol: '000001.KS' },
        { code: '000001', market: 'KOSPI', name: 'Second', yahooSymbol: '000001.KS' },
        { code: '000001', market: 'KOSDAQ', name: 'Other', yahooSymbol: '000001.KQ' },
      ]).map((row) => row.name)
    ).toEqual(['First', 'Other']);
  });
});
