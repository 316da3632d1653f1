import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 15000,
    env: {
      LOG_DIR: '',
      LOG_LEVEL: 'error',
    },
  },
});
