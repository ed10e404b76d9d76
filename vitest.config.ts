import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for provenant.
 *
 * Tests live beside the sources in `__tests__` directories. They only touch
 * per-test temp directories; adapters that would spawn processes are mocked.
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
  },
});
