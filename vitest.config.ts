import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    pool: 'forks',
    coverage: {
      reporter: ['text', 'lcov'],
      enabled: false,
    },
  },
});
