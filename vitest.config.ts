import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration shared by every workspace package.
 * Workspace packages resolve to their TypeScript sources, so no build runs first.
 */
export default defineConfig({
  resolve: {
    alias: {
      'depgate-core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    testTimeout: 10000,
  },
});
