import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/__tests__/**/*.{test,spec}.ts',
      'backend/src/**/__tests__/**/*.{test,spec}.ts',
    ],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      CHAIN_RPC_URL: 'ws://127.0.0.1:9944',
    },
    testTimeout: 20000,
  },
});
