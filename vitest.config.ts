/**
 * Vitest Configuration for csvq
 *
 * Runs every Node.js test (unit and integration) in one pass:
 *   npm test
 *
 * For a single suite:
 *   npm run test:unit
 *   npm run test:integration
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,

    // CLI tests patch process.stdout/stderr, so each file gets its own fork
    pool: 'forks',
    fileParallelism: true,
    sequence: {
      shuffle: false,
    },

    include: ['tests/**/*.test.ts'],

    setupFiles: ['tests/setup.ts'],

    testTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.d.ts',
        'src/**/index.ts', // Re-export files
      ],
    },
  },
})
