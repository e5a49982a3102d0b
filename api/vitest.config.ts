/**
 * Vitest Configuration
 * @module vitest.config
 *
 * Test configuration for the flight board cache and health API.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    globals: true,
    environment: 'node',

    // Test file patterns
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],

    // Setup files
    setupFiles: ['./tests/setup.ts'],

    // Timeout configuration
    testTimeout: 30000,
    hookTimeout: 30000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/index.ts', // Barrel exports
        'src/server.ts', // Process entry point
        'tests/**/*.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    // Pool configuration for parallel execution
    pool: 'threads',

    // Sequence configuration
    sequence: {
      shuffle: false,
      concurrent: false,
    },

    // Mock configuration
    clearMocks: true,
  },

  // ESBuild configuration for TypeScript
  esbuild: {
    target: 'node20',
  },
});
