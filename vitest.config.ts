import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration.
 *
 * Every package is a project with its own vitest.config.ts; this file only
 * fixes the behaviour shared by all of them.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',

    // No retries - surface nondeterminism immediately
    retry: 0,

    // Property-based specs run a few hundred cases each
    testTimeout: isCI ? 30000 : 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },

    projects: ['packages/*'],

    env: {
      NODE_ENV: 'test',
    },
  },
});
