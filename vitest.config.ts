import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@trimfit/core': fromRoot('./packages/core/src/index.ts'),
      '@trimfit/reader-pdfjs': fromRoot('./packages/reader/pdfjs/src/index.ts'),
      '@trimfit/editor-pdf-lib': fromRoot('./packages/editor/pdf-lib/src/index.ts'),
      '@trimfit/layout-pdfjam': fromRoot('./packages/layout/pdfjam/src/index.ts'),
      '@trimfit/cli': fromRoot('./packages/cli/src/index.ts'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/**/tests/**/*.test.ts'],
  },
});
