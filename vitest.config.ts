import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      PRETTY_LOGS: 'false',
    },
  },
})
