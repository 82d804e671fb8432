import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['library/typescript/*/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
