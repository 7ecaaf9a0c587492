/**
 * Vitest Configuration
 *
 * Unit and HTTP tests run against temp directories and an in-memory
 * SQLite database. Logging is silenced unless LOG_LEVEL is overridden.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    env: {
      LOG_LEVEL: process.env.LOG_LEVEL ?? 'silent',
    },
  },
});
