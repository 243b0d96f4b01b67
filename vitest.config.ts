import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['jfold-*/src/**/*.test.{ts,tsx}'],
    environment: 'node',
  },
});
