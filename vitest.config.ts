import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15_000,
    env: {
      LOG_LEVEL: 'silent',
      TELEGRAM_ENABLED: 'false',
      DB_PATH: ':memory:',
      EXCHANGE_MAX_RETRIES: '1',
      EXCHANGE_RETRY_BASE_MS: '1',
    },
  },
});
