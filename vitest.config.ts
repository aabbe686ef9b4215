import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // PDF rendering and rasterization take a few seconds on a cold start
    testTimeout: 30_000,
  },
});
