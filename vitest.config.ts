import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', 'src/**/*.test.ts', 'src/test-utils/**', 'src/library-cli.ts'],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
});
