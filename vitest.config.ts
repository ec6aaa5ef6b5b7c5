import { defineConfig } from 'vitest/config';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    globals: true,
    include: ['src/**/*.test.ts', 'tests/**/*.spec.ts'],
  },
  resolve: {
    alias: [
      { find: '@', replacement: path.resolve(root, 'src') },
    ],
  },
});
