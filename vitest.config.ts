import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['hash-compare/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000
  }
});
