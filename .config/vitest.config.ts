import { defineConfig } from 'vitest/config';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const root = resolve(fileURLToPath(import.meta.url), '../..');

export default defineConfig({
  test: {
    root,
    watch: false,
    include: [
      'tests/**/*.test.ts',
    ],
    exclude: [
      '**/node_modules/**',
    ],
    benchmark: {
      include: [
        'tests/**/*.benchmark.ts',
      ],
    },
    coverage: {
      provider: 'v8',
      include: [
        'src/**/*.ts',
      ],
      exclude: [
        '**/node_modules/**',
        '**/*.d.ts',
        'src/index.ts',
        'src/types.ts',
      ],
      thresholds: {
        statements: 95,
        branches: 90,
        functions: 95,
        lines: 95,
      },
      clean: true,
      reportsDirectory: './.config/coverage',
    },
  },
});
