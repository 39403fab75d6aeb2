import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    isolate: true,
    testTimeout: 20000,
    env: {
      NODE_ENV: 'test',
    },
  },
});
