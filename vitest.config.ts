import { defineConfig } from 'vitest/config';

/**
 * Workspace test configuration.
 *
 * Each package under packages/ is a Vitest project with its own config;
 * this file only carries the settings shared by every run.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',

    // No retries - surface issues immediately
    retry: 0,
    fileParallelism: !isCI,

    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/__fixtures__/**',
      ],
    },

    projects: ['packages/*'],
  },
});
