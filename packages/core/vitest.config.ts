import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: [
      {
        find: '@expensox/shared',
        replacement: fileURLToPath(new URL('../shared/src/index.ts', import.meta.url)),
      },
      {
        find: '@expensox/db/testing',
        replacement: fileURLToPath(new URL('../db/src/testing/index.ts', import.meta.url)),
      },
      {
        find: '@expensox/db',
        replacement: fileURLToPath(new URL('../db/src/index.ts', import.meta.url)),
      },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
