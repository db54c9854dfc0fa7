import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const local = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@inkline/shared': local('./packages/shared/index.ts'),
      '@inkline/pipeline': local('./packages/pipeline/src/index.ts'),
      '@inkline/jobs': local('./packages/jobs/src/index.ts'),
      '@inkline/api': local('./packages/api/src/index.ts'),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
  },
});
