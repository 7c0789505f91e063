/**
 * Vitest configuration for every workspace.
 *
 * Database tests boot an in-process PGlite instance and replay the real
 * migrations, so hooks and tests get generous timeouts.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
})
