import { defineConfig, type ViteUserConfig } from 'vitest/config';

/**
 * Vitest Configuration
 *
 * Every suite is a deterministic in-process unit test. Set
 * CONFIDENCE_TEST_WORKERS to cap the fork pool on constrained machines.
 */
export default defineConfig((): ViteUserConfig => {
  const envWorkers = parseInt(process.env.CONFIDENCE_TEST_WORKERS ?? '', 10);
  const maxForks = !isNaN(envWorkers) && envWorkers > 0 ? envWorkers : 2;

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
          maxForks,
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
