import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for ci-triage
 *
 * Everything runs in-process. Bundle-source tests create their directories
 * under `os.tmpdir()`; the MCP server is exercised through `callTool`.
 */
export default defineConfig({
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
        maxForks: 2,
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
        '**/__tests__/fixtures.ts',
        'vitest.config.ts',
        'vitest.setup.ts',
      ],
    },
  },
});
