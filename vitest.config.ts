import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'unit',
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
    // Suites share nothing but the OS temp dir; each one makes its own.
    pool: 'forks',
  },
})
