import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@snakify/shared': path.resolve(__dirname, 'packages/shared/src/index.ts'),
      '@snakify/migrate': path.resolve(__dirname, 'packages/migrate/src/index.ts'),
      '@snakify/cli': path.resolve(__dirname, 'packages/cli/src/program.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.tmp/**', '**/__fixtures__/**'],
  },
});
