import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/index.ts', 'packages/controller/src/cli.ts'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: {
      '@rbac-sync/shared': fromRoot('./packages/shared/src/index.ts'),
      '@rbac-sync/core': fromRoot('./packages/core/src/index.ts'),
      '@rbac-sync/controller': fromRoot('./packages/controller/src/index.ts'),
    },
  },
});
