import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/test/**/*.test.ts'],
    restoreMocks: true,
    clearMocks: true,
    // Child-process tests spawn node itself
    testTimeout: 15000,
  },
});
