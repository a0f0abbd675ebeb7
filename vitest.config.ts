import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['back/tests/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true
  }
})
