import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['simulation/**/*.test.ts', 'server/**/*.test.ts'],
    exclude: ['**/node_modules/**'],
  },
});
