import { defineConfig } from 'vitest/config'

// Note: Vite shows a CJS deprecation warning but this is just informational.
// The package is CommonJS so the compiled library loads with plain require().
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'test/', 'dist/']
    }
  }
})
