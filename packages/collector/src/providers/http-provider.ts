/**
 * @fileoverview Chunk provider backed by a broker-gateway HTTP bridge.
 *
 * The bridge exposes the broker's chart, quota and instrument endpoints as
 * JSON. Requests use axios with a per-request timeout.
 *
 * @module @minutely/collector/providers/http-provider
 */

import axios from 'axios';
import { z } from 'zod';
import type { Bar, ChunkProvider, QuotaStatus, WorkItem } from '@minutely/contracts';
import {
  ProviderParseError,
  ProviderRateLimitError,
  ProviderRequestError,
  errorMessage,
} from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import { createSilentLogger } from '@minutely/logger';

/**
 * The slice of an axios instance the provider uses. Tests pass a stub.
 */
export interface HttpGetter {
  get(url: string, config?: { params?: Record<string, string | number> }): Promise<{ data: unknown }>;
}

export interface HttpChunkProviderOptions {
  /** Gateway root, e.g. `http://127.0.0.1:8700` */
  baseUrl: string;

  /** Sent as `X-API-Key` when set */
  apiKey?: string;

  timeoutMs?: number;

  /** Overrides the axios instance built from the options above */
  http?: HttpGetter;

  logger?: Logger;
}

const chartSchema = z.object({
  rows: z.array(z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number(), z.number()])),
});

const quotaSchema = z.object({
  remaining: z.number(),
  waitMs: z.number(),
});

const instrumentSchema = z.object({
  name: z.string(),
  section: z.number(),
  market: z.number(),
});

type Instrument = z.infer<typeof instrumentSchema>;

/** Equity section code on the broker side. */
const EQUITY_SECTION = 1;

/** Main board and growth board market codes. */
const LISTED_MARKETS = new Set([1, 2]);

function parsePayload<T>(schema: z.ZodType<T>, data: unknown, endpoint: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ProviderParseError(`Malformed response from ${endpoint}`, {
      endpoint,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}

function retryAfterMs(header: unknown): number | undefined {
  const seconds = typeof header === 'string' || typeof header === 'number' ? Number(header) : NaN;
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Implements {@link ChunkProvider} over the gateway's REST endpoints.
 *
 * @example
 * ```typescript
 * const provider = new HttpChunkProvider({
 *   baseUrl: process.env.PROVIDER_BASE_URL,
 *   apiKey: process.env.PROVIDER_API_KEY,
 * });
 *
 * const bars = await provider.requestChunk('A005930', 20250101, 20250131);
 * ```
 */
export class HttpChunkProvider implements ChunkProvider {
  readonly name = 'gateway';

  private readonly http: HttpGetter;
  private readonly logger: Logger;
  private readonly instruments = new Map<WorkItem, Instrument>();

  constructor(options: HttpChunkProviderOptions) {
    this.logger = options.logger ?? createSilentLogger();
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 30_000,
        headers: options.apiKey ? { 'X-API-Key': options.apiKey } : {},
      });
  }

  async requestChunk(item: WorkItem, fromYmd: number, toYmd: number): Promise<Bar[]> {
    const data = await this.get('/chart/minute', { code: item, from: fromYmd, to: toYmd });
    const { rows } = parsePayload(chartSchema, data, '/chart/minute');

    return rows.map(([date, time, open, high, low, close, volume]) => ({
      date,
      time,
      open,
      high,
      low,
      close,
      volume,
    }));
  }

  async remainingQuota(): Promise<QuotaStatus> {
    const data = await this.get('/limit');
    return parsePayload(quotaSchema, data, '/limit');
  }

  /**
   * Listed equities on the two main boards only.
   */
  async isValidItem(item: WorkItem): Promise<boolean> {
    try {
      const info = await this.instrument(item);
      return info.section === EQUITY_SECTION && LISTED_MARKETS.has(info.market);
    } catch (error) {
      if (error instanceof ProviderRequestError && error.statusCode === 404) {
        return false;
      }
      throw error;
    }
  }

  async itemName(item: WorkItem): Promise<string> {
    const info = await this.instrument(item);
    return info.name;
  }

  /**
   * Instrument metadata, fetched once per item. Validation during work-list
   * building warms the cache, so names cost no request later.
   */
  private async instrument(item: WorkItem): Promise<Instrument> {
    const cached = this.instruments.get(item);
    if (cached) {
      return cached;
    }
    const endpoint = `/stock/${encodeURIComponent(item)}`;
    const data = await this.get(endpoint);
    const info = parsePayload(instrumentSchema, data, '/stock/:code');
    this.instruments.set(item, info);
    return info;
  }

  private async get(
    endpoint: string,
    params?: Record<string, string | number>
  ): Promise<unknown> {
    try {
      const response = await this.http.get(endpoint, params ? { params } : undefined);
      return response.data;
    } catch (error) {
      throw this.mapError(error, endpoint);
    }
  }

  private mapError(error: unknown, endpoint: string): Error {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;

      if (status === 429) {
        const retryAfter = retryAfterMs(error.response?.headers['retry-after']);
        this.logger.warn('Gateway rate limit hit', { endpoint, retry_after_ms: retryAfter });
        return new ProviderRateLimitError('Gateway rate limit exceeded', {
          provider: this.name,
          ...(retryAfter !== undefined ? { retryAfterMs: retryAfter } : {}),
        });
      }

      return new ProviderRequestError(
        status ? `Gateway responded ${status} for ${endpoint}` : `Gateway request failed: ${error.message}`,
        {
          provider: this.name,
          url: endpoint,
          ...(status !== undefined ? { statusCode: status } : {}),
        }
      );
    }

    return new ProviderRequestError(`Gateway request failed: ${errorMessage(error)}`, {
      provider: this.name,
      url: endpoint,
    });
  }
}
