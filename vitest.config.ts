import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vitest/config'

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    // Mock cleanup settings
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        'coverage/**',
        'dist/**',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts'],
  },
  resolve: {
    // Mirrors the "paths" block of tsconfig.json
    alias: {
      '@boot': fromRoot('./src/boot'),
      '@core': fromRoot('./src/core'),
      '@events': fromRoot('./src/events'),
      '@features': fromRoot('./src/features'),
      '@logging': fromRoot('./src/logging'),
      '@system': fromRoot('./src/system'),
      '@utils': fromRoot('./src/utils'),
      '@validation': fromRoot('./src/validation'),
      '$types': fromRoot('./src/types'),
    },
  },
})
