import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const coreSrc = fileURLToPath(new URL('../../core/src', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      {
        find: '@expensox/shared',
        replacement: fileURLToPath(new URL('../../shared/src/index.ts', import.meta.url)),
      },
      {
        find: '@expensox/db/testing',
        replacement: fileURLToPath(new URL('../../db/src/testing/index.ts', import.meta.url)),
      },
      {
        find: '@expensox/db',
        replacement: fileURLToPath(new URL('../../db/src/index.ts', import.meta.url)),
      },
      {
        find: /^@expensox\/core\/(auth|events|audit|email|currency|companies|observability)$/,
        replacement: `${coreSrc}/$1/index.ts`,
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
