/**
 * Vitest Configuration
 *
 * Runs every workspace package's tests in one pass:
 * - core: @jstyle/core tests (source index, CST adapter, errors)
 * - cli: @jstyle/cli tests (rules, finality engine, config, fixer, CLI)
 *
 * @jstyle/core resolves to its TypeScript sources so tests need no build.
 */
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@jstyle/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/index.ts'],
    },
  },
});
