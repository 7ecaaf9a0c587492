import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../logger.js';

export interface AppConfig {
  port: number;
  dataDir: string;
  backupDir: string;
  idempotencyDbPath: string;
  cache: {
    maxSize: number;
    ttlSeconds: number;
  };
  logLevel: LogLevel;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATA_DIR: z.string().min(1).default('data/collections'),
  BACKUP_DIR: z.string().min(1).default('data/backups'),
  IDEMPOTENCY_DB_PATH: z.string().min(1).default('data/idempotency.db'),
  CACHE_MAX_SIZE: z.coerce.number().int().positive().default(100),
  CACHE_TTL_SECONDS: z.coerce.number().positive().default(300),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/**
 * Builds the configuration from an environment map.
 * Relative paths resolve against the working directory.
 * Throws on invalid values so a misconfigured server never starts.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    dataDir: path.resolve(process.cwd(), vars.DATA_DIR),
    backupDir: path.resolve(process.cwd(), vars.BACKUP_DIR),
    idempotencyDbPath:
      vars.IDEMPOTENCY_DB_PATH === ':memory:'
        ? ':memory:'
        : path.resolve(process.cwd(), vars.IDEMPOTENCY_DB_PATH),
    cache: {
      maxSize: vars.CACHE_MAX_SIZE,
      ttlSeconds: vars.CACHE_TTL_SECONDS,
    },
    logLevel: vars.LOG_LEVEL,
  };
}

/**
 * Loads .env (if present) into process.env and parses the result.
 */
export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
