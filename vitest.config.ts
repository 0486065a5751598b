import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false, // Prefer explicit imports for better portability
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      DB_PATH: ':memory:',
      LOG_LEVEL: 'silent',
      ENCRYPTION_SECRET: 'test-secret-0123456789',
      GOOGLE_CLIENT_ID: 'test-client-id',
      GOOGLE_CLIENT_SECRET: 'test-client-secret',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      exclude: ['node_modules/', 'dist/', 'tests/'],
    },
  },
});
