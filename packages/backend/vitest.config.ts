import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      DATABASE_URL: ':memory:',
      ENVIRONMENT: 'testing',
      SECRET_KEY: 'test-secret-key-for-csrf-signing-000000',
      CSRF_PROTECTION: 'false',
      LOG_LEVEL: 'silent',
    },
  },
});
