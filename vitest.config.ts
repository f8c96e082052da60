import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages are consumed from source; dist only exists after a build
      '@digest/shared': path.resolve(__dirname, 'agents/shared/src/index.ts'),
    },
  },
  test: {
    setupFiles: ['./agents/summary-scraper/tests/setup.ts'],
    globals: true,
    environment: 'node',
    testTimeout: 30000,
    include: [
      'agents/*/test/**/*.test.ts',
      'agents/*/tests/**/*.test.ts',
    ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    pool: 'forks',
  },
});
