import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  dts: true,
  clean: true,
  treeshake: true,
  splitting: false,
  sourcemap: true,
  tsconfig: './tsconfig.json',
});
