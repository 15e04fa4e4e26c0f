import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // HiGHS loads its WebAssembly module on first use
    testTimeout: 30_000,
  },
});
