import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // Statistical selection tests draw a few hundred thousand samples
    testTimeout: 20000,
  },
});
