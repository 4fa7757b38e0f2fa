import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['tests/**/*-helper.ts'],
    env: {
      NODE_ENV: 'test',
      VITEST: 'true',
      LOG_LEVEL: 'error',
    },
    testTimeout: 20000,
  },
});
