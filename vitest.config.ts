import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    testTimeout: 30000,
    hookTimeout: 60000,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true, // One in-memory database per fork; keep suites sequential
      },
    },
    fileParallelism: false,
    env: {
      NODE_ENV: 'test',
      DB_CLIENT: 'better-sqlite3',
      DB_FILENAME: ':memory:',
      JWT_SECRET: 'test-secret',
      LOG_LEVEL: 'silent',
      BUSINESS_TIMEZONE: 'Africa/Dar_es_Salaam',
    },
    sequence: {
      setupFiles: 'list',
    },
  },
});
