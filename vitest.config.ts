import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/**/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/cli/src/index.ts', 'packages/**/src/**/*.test.ts']
    }
  },
  resolve: {
    alias: {
      '@reelcut/engine': path.resolve(__dirname, 'packages/engine/src'),
      '@reelcut/settings': path.resolve(__dirname, 'packages/settings/src'),
      '@reelcut/system-check': path.resolve(__dirname, 'packages/system-check/src')
    }
  }
});
