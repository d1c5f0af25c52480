import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['bot/**/__tests__/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['bot/__tests__/setup.ts'],
    testTimeout: 10000
  }
});
