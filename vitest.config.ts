import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolve = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Subpath exports (must come before main package aliases)
      '@ipgeo/core/utils': resolve('./packages/core/src/utils/index.ts'),
      '@ipgeo/core/types': resolve('./packages/core/src/types/index.ts'),
      // Main package aliases
      '@ipgeo/client': resolve('./packages/client/src/index.ts'),
      '@ipgeo/core': resolve('./packages/core/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/index.ts'],
    },
  },
});
