import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    testTimeout: 20000,
    hookTimeout: 20000,
    setupFiles: ['tests/setup.ts'],
    include: ['packages/**/test/**/*.spec.ts', 'packages/**/src/__tests__/**/*.test.ts']
  },
})
