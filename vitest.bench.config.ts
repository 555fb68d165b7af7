/**
 * Vitest benchmark configuration.
 *
 * Separate from the main vitest.config.ts to avoid running benchmarks
 * alongside the test projects. Benchmarks run once via `npm run test:bench`.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    benchmark: {
      include: ['src/benchmarks/**/*.bench.ts'],
    },
  },
});
