import { defineConfig } from 'vitest/config'
import { resolve } from 'path'
import { fileURLToPath } from 'url'

const root = fileURLToPath(new URL('.', import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    testTimeout: 30000,
    coverage: { provider: 'v8', reporter: ['text', 'html'] }
  },
  resolve: {
    alias: {
      '@shared': resolve(root, 'src/shared')
    }
  }
})
