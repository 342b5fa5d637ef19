import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@warrant-ledger/types': path.resolve(root, 'packages/types/src/index.ts'),
      '@warrant-ledger/page-text': path.resolve(root, 'packages/page-text/src/index.ts'),
      '@warrant-ledger/register-parser': path.resolve(root, 'packages/register-parser/src/index.ts'),
      '@warrant-ledger/reconcile': path.resolve(root, 'packages/reconcile/src/index.ts'),
      '@warrant-ledger/ledger': path.resolve(root, 'packages/ledger/src/index.ts'),
      '@warrant-ledger/verifier': path.resolve(root, 'packages/verifier/src/index.ts'),
      '@warrant-ledger/output': path.resolve(root, 'packages/output/src/index.ts'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
