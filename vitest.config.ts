import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@phiql/compiler': fileURLToPath(new URL('./packages/compiler/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/__tests__/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
