/**
 * Vitest Configuration for hr-synth
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts', // Re-export file
        'src/cli/bin.ts',
        'tests/**',
        'node_modules/**',
        'dist/**'
      ]
    },

    // The 10k-employee distribution checks need more than the default
    testTimeout: 60000,
    hookTimeout: 10000,

    globals: true,

    mockReset: true,
    restoreMocks: true,
    clearMocks: true
  }
});
