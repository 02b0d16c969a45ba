import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Dataset fixtures are written to disk per test
    testTimeout: 10000,
    globals: true,
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
  },
});
