import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['__tests__/**/*.test.ts'],
    environment: 'node',
    // Perft and multi-ply searches run on the test thread
    testTimeout: 30000,
  },
});
