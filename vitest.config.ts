import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'txn-quality-etl',
    include: ['backend/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    pool: 'forks',
  },
});
