/**
 * Vitest Configuration - Sync Engine Package
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'sync-engine',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/__tests__/**',
        'src/cli.ts',
        'node_modules/**',
      ],
    },
    testTimeout: 15000,
  },
});
