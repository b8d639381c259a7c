import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false, // Prefer explicit imports for better portability
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      exclude: ['node_modules/', 'dist/', 'tests/'],
    },
    sequence: {
      // prom-client keeps a global registry shared by the app suites
      concurrent: false,
    },
  },
});
