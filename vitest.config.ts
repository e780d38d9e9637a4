import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'packages/*/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
    },
  },
})
