import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@colstream/types': fromRoot('./packages/types/src/index.ts'),
      '@colstream/pdf-extract': fromRoot('./packages/pdf-extract/src/index.ts'),
      '@colstream/tagging': fromRoot('./packages/tagging/src/index.ts'),
      '@colstream/stream': fromRoot('./packages/stream/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
