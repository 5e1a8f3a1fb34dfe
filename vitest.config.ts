import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        'config.ts',
        'errors.ts',
        'timestamps.ts',
        'normalizer.ts',
        'gapDetector.ts',
        'monitor.ts',
        'cli.ts',
        'lib/**/*.ts',
      ],
      exclude: ['node_modules/**', 'tests/**', '**/*.test.ts'],
    },
  },
});
