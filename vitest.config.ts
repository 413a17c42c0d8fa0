import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['coordinator/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent'
    },
    testTimeout: 10000,
    hookTimeout: 10000
  }
});
