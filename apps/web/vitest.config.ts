import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packages = fileURLToPath(new URL('../../packages', import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
  resolve: {
    alias: [
      { find: '@expensox/shared', replacement: `${packages}/shared/src/index.ts` },
      { find: '@expensox/db', replacement: `${packages}/db/src/index.ts` },
      { find: '@expensox/module-expenses', replacement: `${packages}/modules/expenses/src/index.ts` },
      { find: '@expensox/core/auth/with-middleware', replacement: `${packages}/core/src/auth/with-middleware.ts` },
      { find: '@expensox/core/users', replacement: `${packages}/core/src/users.ts` },
      {
        find: /^@expensox\/core\/(auth|events|audit|email|otp|permissions|currency|companies|config|observability)$/,
        replacement: `${packages}/core/src/$1/index.ts`,
      },
      { find: /^@expensox\/core$/, replacement: `${packages}/core/src/index.ts` },
      { find: /^@\//, replacement: `${fileURLToPath(new URL('./src', import.meta.url))}/` },
    ],
  },
});
