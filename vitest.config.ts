import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.{test,spec}.ts',
        'src/__tests__/helpers/**',
        'src/api/start.ts',
        // Type-only files (no executable code)
        'src/models/**/*.ts',
        'src/data/repository.ts',
      ]
    },
  }
});
