import { defineConfig } from 'vitest/config';

/**
 * Root vitest configuration for every workspace package.
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**'],
    testTimeout: 10000,
    reporters: ['default'],
  },
});
