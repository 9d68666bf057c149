/**
 * FILE PURPOSE: Root Vitest config for the monorepo
 *
 * HOW: One run discovers tests in packages/ and apps/.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    testTimeout: 15_000,
    coverage: {
      provider: 'v8',
      include: ['packages/**/src/**/*.ts', 'apps/**/src/**/*.ts'],
      exclude: ['**/index.ts'],
    },
  },
});
