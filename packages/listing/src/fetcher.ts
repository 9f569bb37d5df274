/**
 * @fileoverview HTTP access to the market-cap pages.
 *
 * Pages are served as EUC-KR, so bodies are read as bytes and decoded here.
 */

import { TextDecoder } from 'node:util';
import axios from 'axios';
import { ProviderRequestError, errorMessage, retryDelay, sleep as defaultSleep } from '@minutely/contracts';
import type { Sleep } from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import { createSilentLogger } from '@minutely/logger';

export interface PageFetcher {
  fetchPage(url: string): Promise<string>;
}

/**
 * The slice of an axios instance the fetcher uses. Tests pass a stub.
 */
export interface BinaryGetter {
  get(url: string): Promise<{ data: unknown }>;
}

export interface HttpPageFetcherOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  encoding?: string;
  http?: BinaryGetter;
  sleep?: Sleep;
  logger?: Logger;
}

const DEFAULT_HEADERS = {
  'User-Agent': 'Mozilla/5.0',
  'Accept-Language': 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7',
  Referer: 'https://finance.naver.com/',
};

const PROVIDER = 'market-sum';

function isRetryable(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  return status === undefined || status === 429 || status >= 500;
}

function toBytes(data: unknown): Uint8Array | undefined {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return undefined;
}

export class HttpPageFetcher implements PageFetcher {
  private readonly http: BinaryGetter;
  private readonly maxAttempts: number;
  private readonly decoder: TextDecoder;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? 15_000,
        responseType: 'arraybuffer',
        headers: DEFAULT_HEADERS,
      });
    this.maxAttempts = options.maxAttempts ?? 6;
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
    this.decoder = new TextDecoder(options.encoding ?? 'euc-kr');
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createSilentLogger();
  }

  async fetchPage(url: string): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.http.get(url);
        const bytes = toBytes(response.data);
        if (bytes) {
          return this.decoder.decode(bytes);
        }
        if (typeof response.data === 'string') {
          return response.data;
        }
        throw new ProviderRequestError(`Unexpected body type for ${url}`, { provider: PROVIDER, url });
      } catch (error) {
        if (!isRetryable(error) || attempt + 1 >= this.maxAttempts) {
          throw this.wrap(error, url);
        }
        const waitMs = retryDelay(attempt, 'error');
        this.logger.warn('Page request failed, retrying', {
          url,
          attempt: attempt + 1,
          wait_ms: waitMs,
          error: errorMessage(error),
        });
        await this.sleep(waitMs);
      }
    }
  }

  private wrap(error: unknown, url: string): Error {
    if (error instanceof ProviderRequestError) {
      return error;
    }
    const status = axios.isAxiosError(error) ? error.response?.status : undefined;
    return new ProviderRequestError(
      status ? `Page responded ${status}: ${url}` : `Page request failed: ${errorMessage(error)}`,
      { provider: PROVIDER, url, ...(status !== undefined ? { statusCode: status } : {}) }
    );
  }
}
