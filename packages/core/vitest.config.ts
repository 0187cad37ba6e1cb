import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: '@capture-regex/core',
    environment: 'node',
  },
})
