import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // First resvg render loads the native binding
    testTimeout: 20000,
  },
});
