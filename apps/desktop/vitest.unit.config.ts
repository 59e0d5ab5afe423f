import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@sidecar-launcher/core': path.resolve(__dirname, '../../packages/launcher-core/src/index.ts'),
    },
  },
  test: {
    name: 'desktop-unit',
    root: __dirname,
    include: ['__tests__/**/*.unit.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    testTimeout: 5000,
    hookTimeout: 10000,
  },
});
