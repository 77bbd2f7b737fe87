import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['test/setup.ts'],
    include: ['test/**/*.test.ts'],
    // Speed + stability
    pool: 'threads',
    isolate: true,
    testTimeout: 10_000,
    hookTimeout: 10_000
  }
})
