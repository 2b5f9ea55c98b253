import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'stream-node',
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 10_000,
    hookTimeout: 10_000,
    env: {
      LZ4_STREAM_LOG_LEVEL: 'silent'
    },
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts']
    }
  }
})
