import { resolve } from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@libs/core': resolve(__dirname, 'libs/core/src/index.ts'),
      '@libs/market-data': resolve(__dirname, 'libs/market-data/src/index.ts'),
      '@libs/signals': resolve(__dirname, 'libs/signals/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
