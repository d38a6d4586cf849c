import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@tessera/core': path.resolve(__dirname, 'packages/core/src'),
      '@tessera/crawler': path.resolve(__dirname, 'packages/crawler/src'),
      '@tessera/db': path.resolve(__dirname, 'packages/db/src'),
      '@tessera/schemas': path.resolve(__dirname, 'packages/schemas/src'),
    },
  },
});
