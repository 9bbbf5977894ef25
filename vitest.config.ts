import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['npm/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
