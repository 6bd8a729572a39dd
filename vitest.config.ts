import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Include test files
    include: ['tests/**/*.test.ts'],
    // PGlite needs a few seconds to boot the first time
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
  resolve: {
    // Resolve relative imports written without extensions
    extensions: ['.js', '.ts', '.mjs', '.mts', '.json'],
  },
})
