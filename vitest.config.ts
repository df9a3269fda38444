import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    benchmark: {
      include: ['benchmarks/**/*.bench.ts'],
    },
  },
});
