import { describe, it, expect } from 'vitest';
import path from 'path';
import { parseConfig } from '../src/config/index.js';

describe('parseConfig()', () => {
  it('applies defaults', () => {
    const config = parseConfig({});

    expect(config).toEqual({
      port: 3000,
      dataDir: path.resolve(process.cwd(), 'data/collections'),
      backupDir: path.resolve(process.cwd(), 'data/backups'),
      idempotencyDbPath: path.resolve(process.cwd(), 'data/idempotency.db'),
      cache: { maxSize: 100, ttlSeconds: 300 },
      logLevel: 'info',
    });
  });

  it('coerces numeric variables and keeps an in-memory database path', () => {
    const config = parseConfig({
      PORT: '8080',
      CACHE_MAX_SIZE: '5',
      CACHE_TTL_SECONDS: '2',
      IDEMPOTENCY_DB_PATH: ':memory:',
      LOG_LEVEL: 'debug',
    });

    expect(config.port).toBe(8080);
    expect(config.cache).toEqual({ maxSize: 5, ttlSeconds: 2 });
    expect(config.idempotencyDbPath).toBe(':memory:');
    expect(config.logLevel).toBe('debug');
  });

  it('fails fast on invalid values', () => {
    expect(() => parseConfig({ CACHE_MAX_SIZE: '0' })).toThrow(/^Invalid configuration: CACHE_MAX_SIZE/);
    expect(() => parseConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
    expect(() => parseConfig({ PORT: 'abc' })).toThrow(/PORT/);
  });
});
