import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Training runs and temp-dir persistence can be slow on CI disks
    testTimeout: 10000,
    globals: true,
  },
});
