import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * passforge - Vitest Configuration
 *
 * Each package under packages/ is a Vitest project with its own config.
 * Property tests pin their fast-check seeds, so runs are reproducible.
 */

// Unix-like systems use forks for better isolation
const pool = process.platform === 'win32' ? 'threads' : 'forks';
const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    pool,

    // No retries - surface issues immediately
    retry: 0,

    // Statistical tests draw tens of thousands of passwords
    testTimeout: isCI ? 30000 : 15000,
    hookTimeout: 30000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/test-utils/**',
      ],
    },

    projects: ['packages/*'],

    env: {
      NODE_ENV: 'test',
    },
  },
});
