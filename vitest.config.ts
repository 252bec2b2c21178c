import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['./packages/core/src/__tests__/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/index.ts', '**/*.d.ts'],
    },
  },
  resolve: {
    alias: {
      '@otc/types': fromRoot('./packages/types/src'),
      '@otc/core': fromRoot('./packages/core/src'),
    },
  },
});
