import fs from 'fs';
import { createApp } from './app.js';
import { LruCache } from './cache/lru-cache.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { IdempotencyStore } from './db/sqlite.js';
import { createLogger, describeError } from './logger.js';
import { BookingService, type CacheEntry } from './services/booking.service.js';
import { JsonStore } from './storage/json-store.js';

const logger = createLogger('server');

function start(config: AppConfig): void {
  fs.mkdirSync(config.dataDir, { recursive: true });
  fs.mkdirSync(config.backupDir, { recursive: true });

  const store = new JsonStore(config.dataDir);
  const cache = new LruCache<CacheEntry>({ maxSize: config.cache.maxSize, ttlSeconds: config.cache.ttlSeconds });
  const idempotency = new IdempotencyStore(config.idempotencyDbPath);
  const service = new BookingService({ store, cache });

  const app = createApp({ service, idempotency, backupDir: config.backupDir });

  const server = app.listen(config.port, () => {
    logger.info('Clinic scheduler listening', {
      url: `http://localhost:${config.port}`,
      dataDir: config.dataDir,
      logLevel: config.logLevel,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close((error) => {
      idempotency.close();
      if (error) {
        logger.error('Server did not close cleanly', { error: describeError(error) });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  start(loadConfig());
} catch (error) {
  logger.error('Startup failed', { error: describeError(error) });
  process.exit(1);
}
