import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['test/unit/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
    coverage: {
      reporter: ['lcov', 'text'],
      include: ['src/**/*.ts'],
    },
  },
});
