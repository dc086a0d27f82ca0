import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const here = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    root: here('.'),
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@syslang/core': here('../core/src/index.ts'),
      '@syslang/library': here('../library/src/index.ts'),
      '@syslang/model': here('../model/src/index.ts'),
      '@syslang/hypothesis': here('../hypothesis/src/index.ts'),
      '@syslang/report': here('../report/src/index.ts'),
    },
  },
});
