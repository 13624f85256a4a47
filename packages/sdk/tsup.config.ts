import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm', 'cjs'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  target: 'node20',
  platform: 'node',
  outDir: 'dist',
  treeshake: true,
  esbuildOptions(options) {
    options.banner = {
      js: '/* lrclib-sdk v0.3.1 | MIT License */',
    };
  },
  // zod stays a runtime dependency
  external: ['zod'],
});
