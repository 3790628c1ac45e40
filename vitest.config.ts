import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@brushtex/types': path.resolve(root, 'packages/types/src/index.ts'),
      '@brushtex/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@brushtex/adapter-abr': path.resolve(root, 'packages/adapter-abr/src/index.ts'),
      '@brushtex/adapter-gbr': path.resolve(root, 'packages/adapter-gbr/src/index.ts'),
      '@brushtex/adapter-brushset': path.resolve(root, 'packages/adapter-brushset/src/index.ts'),
      '@brushtex/adapter-sut': path.resolve(root, 'packages/adapter-sut/src/index.ts'),
      '@brushtex/import': path.resolve(root, 'packages/import/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    env: {
      BRUSHTEX_LOG_LEVEL: 'silent',
    },
  },
});
