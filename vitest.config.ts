import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function fromRoot(relativePath: string): string {
  return fileURLToPath(new URL(relativePath, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@bizlake/shared': fromRoot('./packages/shared/src/index.ts'),
      '@bizlake/core': fromRoot('./packages/core/src/index.ts'),
      '@bizlake/ingest': fromRoot('./packages/ingest/src/index.ts'),
      '@bizlake/data-pipeline': fromRoot('./packages/data-pipeline/src/index.ts'),
      '@bizlake/diagnostics': fromRoot('./packages/diagnostics/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
  },
});
