import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    alias: {
      app: fileURLToPath(new URL("./src", import.meta.url))
    },
    environment: 'node',
    // synthesizing a stack takes a few seconds
    testTimeout: 30000,
    hookTimeout: 30000,
    include: ['test/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'cdk.out/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        'test/**',
        'dist/**',
        'cdk.out/**',
        '**/*.d.ts',
        'vitest.config.ts'
      ],
      thresholds: {
        branches: 80,
        functions: 80,
        lines: 80,
        statements: 80
      }
    }
  }
})
