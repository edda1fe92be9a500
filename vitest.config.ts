import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    clearMocks: true,
    restoreMocks: true,
    testTimeout: 20_000,
    include: ['tests/**/*.test.ts'],
  },
});
