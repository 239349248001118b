import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    testTimeout: 30000,
    include: ['backend/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent'
    }
  },
});
