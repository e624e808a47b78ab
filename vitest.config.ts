import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['catalog-api/src/**/*.test.ts'],
    // password hashing (scrypt) runs in most suites
    testTimeout: 20_000,
  },
})
