import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    testTimeout: 30_000,
    pool: 'forks',            // native addons (better-sqlite3) serialize poorly across worker_threads
    env: {
      DB_PATH: ':memory:',
    },
  },
})
