import { defineConfig } from 'vitest/config';
import { dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: '@trimat/test-utils',
    root: __dirname,
    globals: true,
    environment: 'node',
    include: ['examples/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
