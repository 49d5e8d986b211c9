import { defineConfig } from 'vitest/config';

/**
 * All tests are pure: the conversation store, carrier gateway and reply generator
 * are replaced by in-process stand-ins from tests/helpers.
 */
export default defineConfig({
  test: {
    globals: true,
    testTimeout: 15000,
    fileParallelism: true,
    include: ['tests/**/*.test.ts', 'src/**/*.test.ts'],
    exclude: ['node_modules/**', '**/node_modules/**'],
    setupFiles: ['./tests/setup-api.ts'],
  },
});
