import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
    env: {
      RECONCILER_LOG_LEVEL: 'fatal',
    },
  },
});
