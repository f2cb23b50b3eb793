import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@stratum/core': path.resolve(__dirname, 'packages/core/src/index.ts')
    }
  },
  test: {
    include: ['packages/**/test/**/*.test.ts'],
    environment: 'node',
    env: {
      STRATUM_LOG_EVENTS: 'false',
      STRATUM_LOG_POLICIES: 'false'
    },
    testTimeout: 10000
  }
});
