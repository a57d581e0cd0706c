import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    root: path.resolve(__dirname),
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@arbor/core': path.resolve(__dirname, '../core/src/index.ts'),
      '@arbor/growth': path.resolve(__dirname, '../growth/src/index.ts'),
      '@arbor/simulator': path.resolve(__dirname, './src/index.ts'),
    },
  },
});
