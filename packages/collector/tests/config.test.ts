import { describe, it, expect } from 'vitest';
import { ConfigError } from '@minutely/contracts';
import { loadConfig, getConfigSummary } from '../src/config/index.js';

const BASE_ENV = { PROVIDER_BASE_URL: 'http://127.0.0.1:8700' };

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig(BASE_ENV);

    expect(config.collector).toEqual({
      outDir: 'out_csv',
      checkpointPath: 'checkpoint.json',
      metaDir: 'split_meta_market',
      artifactSuffix: '_1min_2y.csv',
      lookbackDays: 730,
      bufferDays: 7,
      itemDelayMs: 150,
      maxAttempts: 3,
    });
    expect(config.rate).toEqual({ maxCalls: 13, windowMs: 60_000 });
    expect(config.logging).toEqual({ level: 'info', format: 'pretty', rotate: false });
    expect(config.provider.type).toBe('http');
    expect(config.provider.timeoutMs).toBe(30_000);
  });

  it('should coerce environment strings', () => {
    const config = loadConfig({
      ...BASE_ENV,
      RATE_MAX_CALLS: '20',
      COLLECTOR_BUFFER_DAYS: '0',
      LOG_ROTATE: 'true',
      LOG_FILE: 'logs/collector.log',
      PROVIDER_API_KEY: '12345',
    });

    expect(config.rate.maxCalls).toBe(20);
    expect(config.collector.bufferDays).toBe(0);
    expect(config.logging.rotate).toBe(true);
    expect(config.logging.filePath).toBe('logs/collector.log');
    expect(config.provider.apiKey).toBe('12345');
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig(
      { ...BASE_ENV, COLLECTOR_OUT_DIR: 'from-env', LOG_LEVEL: 'warn' },
      { 'collector.outDir': 'from-flag', 'logging.level': undefined }
    );

    expect(config.collector.outDir).toBe('from-flag');
    expect(config.logging.level).toBe('warn');
  });

  it('should require a base URL for the http provider', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);

    try {
      loadConfig({});
    } catch (error) {
      expect(error instanceof ConfigError && error.issues).toEqual([
        'provider.baseUrl: Required when provider.type is "http" (set PROVIDER_BASE_URL)',
      ]);
    }
  });

  it('should require a fixture directory for the fixture provider', () => {
    expect(() => loadConfig({ PROVIDER_TYPE: 'fixture' })).toThrow(/provider\.fixtureDir/);
    expect(loadConfig({ PROVIDER_TYPE: 'fixture', PROVIDER_FIXTURE_DIR: 'fx' }).provider.fixtureDir).toBe('fx');
  });

  it('should report invalid values by path', () => {
    try {
      loadConfig({ ...BASE_ENV, RATE_MAX_CALLS: 'lots', LOG_LEVEL: 'loud' });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues.map((issue) => issue.split(':')[0]).sort()).toEqual([
        'logging.level',
        'rate.maxCalls',
      ]);
    }
  });

  it('should summarize without secrets', () => {
    const summary = getConfigSummary(loadConfig({ ...BASE_ENV, PROVIDER_API_KEY: 'test-secret' }));

    expect(JSON.stringify(summary)).not.toContain('test-secret');
    expect(summary['rate']).toBe('13/60000ms');
  });
});
