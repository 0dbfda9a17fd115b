import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // test-env must run first: it points the database at a throwaway directory
    setupFiles: ['./src/test-env.ts', './src/test-setup.ts'],
    pool: 'forks',
  },
});
