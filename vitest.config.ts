import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
  },
  resolve: {
    alias: [
      { find: /^@taskstack\/core\/types$/, replacement: path.resolve(root, 'packages/core/src/types/index.ts') },
      { find: /^@taskstack\/core$/, replacement: path.resolve(root, 'packages/core/src/index.ts') },
    ],
  },
});
