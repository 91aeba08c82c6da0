import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.mts'],
    environment: 'node',
    globals: false,
    testTimeout: 10000,
  },
});
