/**
 * Markets listed on the market-cap pages and how each maps to Yahoo symbols.
 */

export type Market = 'KOSPI' | 'KOSDAQ';

export interface MarketSpec {
  market: Market;

  /** `sosok` query value selecting the market */
  sosok: 0 | 1;

  /** Suffix Yahoo uses for the market */
  yahooSuffix: '.KS' | '.KQ';

  /** Hard stop for paging */
  maxPages: number;
}

export const MARKETS: Record<Market, MarketSpec> = {
  KOSPI: { market: 'KOSPI', sosok: 0, yahooSuffix: '.KS', maxPages: 200 },
  KOSDAQ: { market: 'KOSDAQ', sosok: 1, yahooSuffix: '.KQ', maxPages: 240 },
};

export const MARKET_SUM_URL = 'https://finance.naver.com/sise/sise_market_sum.naver';

export function pageUrl(spec: MarketSpec, page: number, baseUrl = MARKET_SUM_URL): string {
  const url = new URL(baseUrl);
  url.searchParams.set('sosok', String(spec.sosok));
  url.searchParams.set('page', String(page));
  return url.toString();
}
