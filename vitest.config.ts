import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (path: string): string => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@budgetline/shared': pkg('shared/src/index.ts'),
      '@budgetline/core': pkg('core/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
  },
});
