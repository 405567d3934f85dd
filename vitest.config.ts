import { defineConfig, type UserConfig } from 'vitest/config';

/**
 * Vitest Configuration for dimension-ranker
 *
 * Every test runs in-process against stand-in collaborators, so a single
 * unit tier is enough. Override the worker count with RANKER_TEST_WORKERS.
 */
export default defineConfig((): UserConfig => {
  let maxWorkers = 2;
  let reasoning = 'Using default worker count';

  const envWorkers = parseInt(process.env.RANKER_TEST_WORKERS ?? '', 10);
  if (!isNaN(envWorkers) && envWorkers > 0) {
    maxWorkers = envWorkers;
    reasoning = `Worker override from env: ${envWorkers}`;
  }

  if (process.env.VITEST_QUIET !== 'true') {
    console.log(`[vitest] ${reasoning}`);
  }

  return {
    test: {
      globals: true,
      environment: 'node',
      include: ['src/**/*.test.ts'],
      setupFiles: ['./vitest.setup.ts'],
      testTimeout: 30000,
      hookTimeout: 10000,
      pool: 'forks',
      poolOptions: {
        forks: {
          maxForks: maxWorkers,
          minForks: 1,
          isolate: true,
        },
      },
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json', 'html'],
        exclude: [
          'node_modules/',
          'dist/',
          '**/*.test.ts',
          'vitest.config.ts',
          'vitest.setup.ts',
        ],
      },
    },
  };
});
