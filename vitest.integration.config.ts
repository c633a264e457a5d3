import { defineConfig } from 'vitest/config'

// Requires PostgreSQL and Valkey (DATABASE_URL, VALKEY_URL).
export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['tests/integration/**/*.test.ts'],
    testTimeout: 20_000,
  },
})
