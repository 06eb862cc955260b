import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Disable file watching by default
    watch: false,
    include: ['src/**/__tests__/**/*.test.ts'],
    // Tests share temp directories under the OS tmpdir, keep them in one fork
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    clearMocks: true,
    restoreMocks: true,
    reporters: ['default'],
  },
});
