import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      GUARD_LOG_LEVEL: 'silent',
    },
    testTimeout: 10000,
  },
});
