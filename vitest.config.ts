import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test file patterns
    include: ['src/**/*.test.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'html'],
      reportsDirectory: './coverage',

      include: ['src/**/*.ts'],

      // Exclude test files and index re-exports
      exclude: ['src/**/*.test.ts', 'src/**/index.ts'],

      thresholds: {
        statements: 80,
        branches: 70,
        functions: 80,
        lines: 80,
      },
    },

    testTimeout: 10000,

    environment: 'node',
  },
});
