import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['cjs', 'esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  minify: false,
  external: ['cross-fetch', 'sync-fetch', 'zod'],
  treeshake: true,
  target: 'node20',
  outDir: 'dist',
});
