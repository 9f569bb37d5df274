/**
 * @fileoverview Tests for logger creation and basic functionality
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createLogger, createSilentLogger } from '../src/createLogger.js';
import { redactValue } from '../src/formats.js';
import { loggingConfigSchema, loggerConfigFrom } from '../src/config.js';
import type { LoggerConfig } from '../src/types.js';
import * as loggerApi from '../src/index.js';

async function readWhenContains(file: string, needle: string, timeoutMs = 2000): Promise<string> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const content = fs.existsSync(file) ? fs.readFileSync(file, 'utf-8') : '';
    if (content.includes(needle) || Date.now() > deadline) {
      return content;
    }
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
}

describe('createLogger', () => {
  let dir: string;
  let logFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'logger-test-'));
    logFile = path.join(dir, 'test.log');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should create a logger with the configured level', () => {
    const config: LoggerConfig = { level: 'warn', json: true, console: false };

    expect(createLogger(config).level).toBe('warn');
  });

  it('should write JSON lines to the file transport', async () => {
    const logger = createLogger({ level: 'info', json: true, filePath: logFile, console: false });

    logger.info('Run started', { total: 2 });

    const content = await readWhenContains(logFile, 'Run started');
    const entry = JSON.parse(content.trim().split('\n')[0] ?? '{}');
    expect(entry.message).toBe('Run started');
    expect(entry.level).toBe('info');
    expect(entry.total).toBe(2);
    expect(typeof entry.timestamp).toBe('string');
  });

  it('should include child context fields', async () => {
    const logger = createLogger({ level: 'info', json: true, filePath: logFile, console: false });

    logger.child({ component: 'orchestrator' }).info('Item collected');

    const content = await readWhenContains(logFile, 'Item collected');
    expect(content).toContain('"component":"orchestrator"');
  });

  it('should redact secret fields before writing', async () => {
    const logger = createLogger({ level: 'info', json: true, filePath: logFile, console: false });

    logger.info('Configuration loaded', { provider: { baseUrl: 'http://gw', apiKey: 'test-secret' } });

    const content = await readWhenContains(logFile, 'Configuration loaded');
    expect(content).toContain('"apiKey":"[REDACTED]"');
    expect(content).not.toContain('test-secret');
  });

  it('should respect log level filtering', async () => {
    const logger = createLogger({ level: 'warn', json: true, filePath: logFile, console: false });

    logger.info('Info message');
    logger.warn('Warn message');

    const content = await readWhenContains(logFile, 'Warn message');
    expect(content).toContain('Warn message');
    expect(content).not.toContain('Info message');
  });

  it('should render pretty single lines when json is off', async () => {
    const logger = createLogger({ level: 'info', json: false, filePath: logFile, console: false });

    logger.child({ component: 'fetcher' }).info('Chunk requested', { item: 'A005930', rows: 3 });

    const content = await readWhenContains(logFile, 'Chunk requested');
    expect(content).toMatch(/^\[.+\] info: Chunk requested component=fetcher item=A005930 rows=3\n$/);
  });

  it('should create a silent logger', () => {
    const logger = createSilentLogger();

    expect(() => logger.error('nothing')).not.toThrow();
  });
});

describe('public API', () => {
  it('should expose one way to derive component loggers', () => {
    const logger = createSilentLogger();

    expect(typeof logger.child({ component: 'fetcher' }).info).toBe('function');
    expect(loggerApi).toHaveProperty('createLogger');
    expect(loggerApi).not.toHaveProperty('createChildLogger');
  });
});

describe('redactValue', () => {
  it('should redact nested keys and leave others alone', () => {
    expect(
      redactValue({ provider: { baseUrl: 'http://gw', apiKey: 'k' }, list: [{ token: 't', n: 1 }] })
    ).toEqual({
      provider: { baseUrl: 'http://gw', apiKey: '[REDACTED]' },
      list: [{ token: '[REDACTED]', n: 1 }],
    });
  });

  it('should pass primitives through', () => {
    expect(redactValue('plain')).toBe('plain');
    expect(redactValue(null)).toBeNull();
  });
});

describe('loggerConfigFrom', () => {
  it('should translate a parsed logging section', () => {
    const logging = loggingConfigSchema.parse({ level: 'debug', format: 'json', rotate: 'true', filePath: 'x.log' });

    expect(loggerConfigFrom(logging)).toEqual({
      level: 'debug',
      json: true,
      rotate: true,
      filePath: 'x.log',
    });
  });

  it('should apply defaults to an empty section', () => {
    expect(loggerConfigFrom(loggingConfigSchema.parse(undefined))).toEqual({
      level: 'info',
      json: false,
      rotate: false,
    });
  });

  it('should reject unknown levels', () => {
    expect(loggingConfigSchema.safeParse({ level: 'loud' }).success).toBe(false);
  });
});
