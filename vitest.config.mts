import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages_mjs/*/tests/**/*.test.mts'],
    globals: false,
    environment: 'node',
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages_mjs/*/src/**/*.mts'],
    },
  },
});
