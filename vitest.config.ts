import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      REACTOR_LOG_LEVEL: 'silent'
    },
    testTimeout: 10000,
    hookTimeout: 10000
  }
});
