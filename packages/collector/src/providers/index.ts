import type { ChunkProvider } from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import type { Config } from '../config/index.js';
import { FixtureChunkProvider } from './fixture-provider.js';
import { HttpChunkProvider } from './http-provider.js';

/**
 * Builds the provider selected by `provider.type`.
 */
export function createProvider(config: Config['provider'], logger: Logger): ChunkProvider {
  switch (config.type) {
    case 'fixture':
      return new FixtureChunkProvider(config.fixtureDir ?? 'fixtures');
    case 'http':
      return new HttpChunkProvider({
        baseUrl: config.baseUrl ?? '',
        timeoutMs: config.timeoutMs,
        logger: logger.child({ component: 'provider' }),
        ...(config.apiKey ? { apiKey: config.apiKey } : {}),
      });
  }
}

export { FixtureChunkProvider } from './fixture-provider.js';
export { HttpChunkProvider } from './http-provider.js';
export type { HttpChunkProviderOptions, HttpGetter } from './http-provider.js';
