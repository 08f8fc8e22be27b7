import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * Vitest configuration for the strand workspace
 *
 * One run covers every package; `@strand/*` imports resolve to sources
 * through the tsconfig paths.
 */

// Platform-specific pool configuration
const getPoolConfig = () => {
  // Windows uses threads, Unix-like systems use forks for better isolation
  const pool = process.platform === 'win32' ? 'threads' : 'forks';

  return {
    pool,
    poolOptions: {
      threads: { singleThread: false, isolate: true },
      forks: { isolate: true },
    },
  };
};

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',

    ...getPoolConfig(),

    // Test files pattern - includes all packages in monorepo
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    // No retries - surface issues immediately
    retry: 0,

    // Disable file parallelization in CI for deterministic results
    fileParallelism: !isCI,

    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
    },
  },
});
