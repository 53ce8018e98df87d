import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@app/contracts': path.resolve(rootDir, 'packages/contracts/src/index.ts'),
      '@app/utils': path.resolve(rootDir, 'packages/utils/src/index.ts'),
      '@app/interop': path.resolve(rootDir, 'packages/interop/src/index.ts'),
      '@app/providers-core': path.resolve(rootDir, 'packages/providers/core/src/index.ts'),
      '@app/providers-file-exporters': path.resolve(rootDir, 'packages/providers/file-exporters/src/index.ts'),
      '@app/auth': path.resolve(rootDir, 'packages/auth/src/index.ts'),
      '@test/support': path.resolve(rootDir, 'test/support/index.ts'),
    },
  },
  test: {
    include: [
      'packages/**/test/**/*.test.ts',
      'apps/**/src/**/__tests__/**/*.test.ts',
    ],
    testTimeout: 30000,
    pool: 'threads',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        'apps/*/src/**',
        'packages/**/src/**',
      ],
      exclude: [
        '**/__tests__/**',
        '**/test/**',
        '**/*.test.ts',
        '**/node_modules/**',
        '**/dist/**',
      ],
    },
  },
});
