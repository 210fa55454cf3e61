import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    // Disable file watching by default
    watch: false,
    // Run tests sequentially to avoid memory issues
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    // Clear mocks between tests
    clearMocks: true,
    isolate: true,
    reporters: ['default'],
  },
});
