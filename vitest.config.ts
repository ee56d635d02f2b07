import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['edition_pages/tests/**/*.spec.ts'],
    environment: 'node',
  },
});
