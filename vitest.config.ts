import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/testing/**/*.test.ts'],
    environment: 'node',
    // PGlite boots a WASM Postgres per suite
    testTimeout: 30000,
    hookTimeout: 60000,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      JWT_SECRET: 'test-secret',
      FRONTEND_BASE_URL: 'http://localhost:5173',
    },
  },
});
