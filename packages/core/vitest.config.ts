import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    watch: false,
    pool: 'forks',
    testTimeout: 10000,
    // Loader tests touch the filesystem
    hookTimeout: 10000,
    clearMocks: true,
    reporters: ['default'],
  },
});
