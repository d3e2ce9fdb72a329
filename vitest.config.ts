import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      CONDUCTOR_SILENT: '1',
    },
    testTimeout: 10000,
  },
});
