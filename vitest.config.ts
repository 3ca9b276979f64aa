import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['Tracker/src/**/*.test.ts', 'Client/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
