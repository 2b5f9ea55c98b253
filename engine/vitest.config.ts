import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'engine',
    include: ['test/**/*.test.ts'],
    environment: 'node',

    // Timeouts
    testTimeout: 10_000,
    hookTimeout: 10_000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts']
    }
  }
})
