import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolvePackage = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ndkit/core': resolvePackage('core'),
      '@ndkit/strings': resolvePackage('strings'),
      '@ndkit/test-utils': resolvePackage('test-utils'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
  },
});
