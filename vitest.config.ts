import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    // better-sqlite3 is a native addon; child processes keep each file's handles isolated.
    pool: 'forks',
    clearMocks: true,
    restoreMocks: true,
  },
});
