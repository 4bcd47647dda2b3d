import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'viewer',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
