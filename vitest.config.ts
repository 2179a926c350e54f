/**
 * Vitest configuration for docmap
 *
 * Unit tests live in tests/unit, integration tests (several models working
 * through one MemoryDocumentStore) in tests/integration. Nothing leaves the
 * process.
 */

import { defineConfig } from 'vitest/config'
import os from 'node:os'

// Use half the cores, between 2 and 8 forks
const optimalForks = Math.max(2, Math.min(Math.floor(os.cpus().length / 2), 8))

export default defineConfig({
  test: {
    globals: true,

    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: optimalForks,
        minForks: 1,
        isolate: true,
      },
    },
    fileParallelism: true,
    sequence: {
      shuffle: false,
    },

    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/index.ts'],
    },
  },
})
