/**
 * @fileoverview Vitest configuration for the workspace
 *
 * @description
 * One run covers every package. Tests live in `__tests__` directories beside
 * the code they exercise and never need a database.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      reportsDirectory: './coverage',
    },
  },
})
