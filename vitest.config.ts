import { defineConfig } from 'vitest/config';

/**
 * Unit tests per component, scenario tests across the whole pipeline.
 * Logging is suppressed under Vitest (see SUPPRESS_TEST_LOGS).
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['tests/**', 'dist/**', '**/*.config.ts', '**/*.d.ts', 'src/**/index.ts'],
    },
    testTimeout: 10000,
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/unit/**/*.test.ts', 'tests/integration/**/*.test.ts'],
  },
});
