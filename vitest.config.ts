/// <reference types="vitest" />

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['src/**/*.{test,spec}.ts'],
    exclude: [
      '**/node_modules/**',
      '**/build/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**',
      '**/coverage/**',
      '**/examples/**',
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'json-summary', 'html', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['**/*.{test,spec}.ts', '**/*.d.ts', 'src/test-utils/**', 'src/index.ts'],
      reportOnFailure: true,
      thresholds: {
        branches: 60,
        functions: 60,
        lines: 60,
        statements: 60,
      },
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks',
    reporters: ['verbose'],
    clearMocks: true,
    restoreMocks: true,
    sequence: {
      hooks: 'stack',
      shuffle: false,
    },
    maxConcurrency: 1,
  },
});
