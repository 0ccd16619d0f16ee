import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/src/test/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
  },
});
