import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'game/src/**/*.test.{ts,tsx}'],
    environment: 'node',
    // the launcher tests change directory, which worker threads do not allow
    pool: 'forks'
  }
});
