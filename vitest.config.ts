import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'unit',
          include: ['src/**/*.{test,spec}.ts', 'examples/**/*.{test,spec}.ts'],
          exclude: ['src/**/*.integration.{test,spec}.ts'],
        },
      },
      {
        test: {
          name: 'integration',
          include: ['src/**/*.integration.{test,spec}.ts'],
          testTimeout: 30_000,
        },
      },
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.{test,spec}.ts', 'src/**/*.d.ts', 'src/benchmarks/**'],
    },
  },
});
