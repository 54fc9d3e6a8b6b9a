import { resolve } from 'node:path';
import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export const globalConfig = defineConfig({
  test: {
    globals: true,
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    // workspace packages publish their compiled output; tests run against the sources
    alias: {
      '@control-plane/logger': resolve(__dirname, 'packages/logger/src/index.ts'),
      '@control-plane/utils': resolve(__dirname, 'packages/utils/src/index.ts'),
    },
  },
  plugins: [swc.vite()],
});

export default defineConfig({
  test: {
    projects: ['packages/*/vitest.config.ts', 'services/*/vitest.config.ts'],
  },
});
