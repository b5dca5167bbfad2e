import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cli',
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
  },
  resolve: {
    alias: {
      '@shardcheck/core': new URL('../core/src/index.ts', import.meta.url)
        .pathname,
    },
  },
});
