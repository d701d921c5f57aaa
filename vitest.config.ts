import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const src = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts', 'packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@wayfarer/types': src('types'),
      '@wayfarer/persistence': src('persistence'),
      '@wayfarer/memory': src('memory'),
      '@wayfarer/runtime': src('runtime'),
      '@wayfarer/core': src('core'),
    },
  },
});
