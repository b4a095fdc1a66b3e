import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['node/src/tests/**/*.spec.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
});
