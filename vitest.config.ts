import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    env: {
      RECONCILER_LOG_LEVEL: 'silent',
    },
  },
});
