/**
 * Vitest Configuration
 *
 * Runs every unit test under tests/. Tests write their fixture shards
 * into fresh temp directories, so files run in parallel safely.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Global test configuration
    globals: true,
    environment: 'node',

    include: ['tests/**/*.test.ts'],

    sequence: {
      shuffle: false, // Keep deterministic order for debugging
    },

    testTimeout: 30000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/index.ts'],
      thresholds: {
        lines: 80,
        branches: 70,
        functions: 80,
        statements: 80,
      },
    },
  },
})
