import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['converter/tests/**/*.test.ts'],
    environment: 'node',
  },
});
