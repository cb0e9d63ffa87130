import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * peanotrace test configuration
 *
 * - Fixed seed and run count for property-based tests (see test/setup.ts)
 * - Platform-specific pool configuration
 * - No retries, so flaky behaviour surfaces immediately
 */

// Windows uses threads, Unix-like systems use forks for isolation
const getPoolConfig = () => {
  const pool: 'threads' | 'forks' =
    process.platform === 'win32' ? 'threads' : 'forks';

  return {
    pool,
    poolOptions: {
      threads: {
        singleThread: false,
        isolate: true,
      },
      forks: {
        isolate: true,
      },
    },
  };
};

const isCI = process.env.CI === 'true';
const isDevelopment = process.env.NODE_ENV === 'development';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',

    ...getPoolConfig(),

    setupFiles: ['./test/setup.ts'],

    // Tests across the monorepo plus the root property suites
    include: ['packages/**/*.{test,spec}.ts', 'test/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,
    fileParallelism: !isCI,

    // Property-based suites run more cases in CI
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,
    teardownTimeout: 5000,

    reporters: isDevelopment ? ['verbose'] : ['default'],
    logHeapUsage: isCI,
    silent: false,

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/types.ts',
      ],
      thresholds: {
        branches: 80,
        functions: 80,
        lines: 80,
        statements: 80,
      },
    },

    isolate: true,

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
