import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['dividends/**/*.test.ts'],
    environment: 'node',
  },
});
