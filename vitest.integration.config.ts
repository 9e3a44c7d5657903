import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'], // Only include integration tests
    pool: 'forks',
    maxWorkers: 1, // Tests share one database
    maxConcurrency: 1,
    env: { NODE_ENV: 'test' },
  },
});
