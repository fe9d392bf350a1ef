import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    // Correlator and transport specs lean on real timers; keep one worker so timing is predictable.
    pool: 'forks',
    maxWorkers: 1,
    minWorkers: 1,
    testTimeout: 10000,
    hookTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'lcov'],
      reportsDirectory: 'coverage',
      include: [
        'src/config/**',
        'src/models/**',
        'src/server/**',
        'src/services/**',
        'src/utils/**'
      ],
      exclude: [
        'dist/**',
        'src/tests/**',
        '**/*.d.ts'
      ]
    }
  }
});
