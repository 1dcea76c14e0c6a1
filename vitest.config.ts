import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['apps/*/tests/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    // Keep the logger quiet unless a test raises it
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
