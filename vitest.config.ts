import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['**/*.test.ts', '**/*.spec.ts'],
    exclude: ['node_modules', 'dist'],
  },
  resolve: {
    alias: {
      '@beacon/core': fileURLToPath(new URL('./packages/core/src', import.meta.url)),
      '@beacon/processor': fileURLToPath(new URL('./apps/processor/src', import.meta.url)),
    },
  },
});
