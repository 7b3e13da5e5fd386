/**
 * Vitest configuration for technitium-reconcile
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    restoreMocks: true,

    testTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts'],
    },

    environment: 'node',

    typecheck: {
      enabled: false, // use tsc --noEmit separately
    },
  },
});
