import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const path = (dir: string): string => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'threads',
    css: false,
    include: ['src/**/*.{test,spec}.ts'],
    globals: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/**/__tests__/**',
        'src/index.ts',
      ],
    },
  },
  resolve: {
    alias: {
      $lib: path('./src/lib'),
      $stores: path('./src/stores'),
      $test: path('./src/__tests__'),
    },
  },
});
