import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
  },
  resolve: {
    alias: {
      '@trivec/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
