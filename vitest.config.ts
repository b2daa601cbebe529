import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['backend/src/**/*.test.ts'],
    // PGlite boots a WASM Postgres per test file
    testTimeout: 20_000,
    hookTimeout: 60_000,
  },
});
