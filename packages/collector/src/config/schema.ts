/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import type { EnvMapping } from '@minutely/contracts';
import { loggingConfigSchema, loggingEnvMapping } from '@minutely/logger';

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

/**
 * Collector configuration schema
 */
export const configSchema = z
  .object({
    logging: loggingConfigSchema,

    collector: z
      .object({
        outDir: z.string().default('out_csv'),
        checkpointPath: z.string().default('checkpoint.json'),
        metaDir: z.string().default('split_meta_market'),
        artifactSuffix: z.string().default('_1min_2y.csv'),
        lookbackDays: positiveInt.default(730),
        bufferDays: nonNegativeInt.default(7),
        itemDelayMs: nonNegativeInt.default(150),
        maxAttempts: positiveInt.default(3),
      })
      .default({}),

    rate: z
      .object({
        maxCalls: positiveInt.default(13),
        windowMs: positiveInt.default(60_000),
      })
      .default({}),

    provider: z
      .object({
        type: z.enum(['http', 'fixture']).default('http'),
        baseUrl: z.string().url().optional(),
        apiKey: z.string().optional(),
        timeoutMs: positiveInt.default(30_000),
        fixtureDir: z.string().optional(),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.provider.type === 'http' && !config.provider.baseUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['provider', 'baseUrl'],
        message: 'Required when provider.type is "http" (set PROVIDER_BASE_URL)',
      });
    }
    if (config.provider.type === 'fixture' && !config.provider.fixtureDir) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['provider', 'fixtureDir'],
        message: 'Required when provider.type is "fixture" (set PROVIDER_FIXTURE_DIR)',
      });
    }
  });

export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mappings
 */
export const envMapping: EnvMapping = {
  ...loggingEnvMapping,

  COLLECTOR_OUT_DIR: 'collector.outDir',
  COLLECTOR_CHECKPOINT: 'collector.checkpointPath',
  COLLECTOR_META_DIR: 'collector.metaDir',
  COLLECTOR_ARTIFACT_SUFFIX: 'collector.artifactSuffix',
  COLLECTOR_LOOKBACK_DAYS: 'collector.lookbackDays',
  COLLECTOR_BUFFER_DAYS: 'collector.bufferDays',
  COLLECTOR_ITEM_DELAY_MS: 'collector.itemDelayMs',
  COLLECTOR_MAX_ATTEMPTS: 'collector.maxAttempts',

  RATE_MAX_CALLS: 'rate.maxCalls',
  RATE_WINDOW_MS: 'rate.windowMs',

  PROVIDER_TYPE: 'provider.type',
  PROVIDER_BASE_URL: 'provider.baseUrl',
  PROVIDER_API_KEY: 'provider.apiKey',
  PROVIDER_TIMEOUT_MS: 'provider.timeoutMs',
  PROVIDER_FIXTURE_DIR: 'provider.fixtureDir',
};
