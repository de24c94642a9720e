import { defineConfig } from 'tsup'

export default defineConfig({
  // Unbundled so that data/ resolves the same way from dist/ as from src/
  entry: ['src/**/*.ts'],
  bundle: false,
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  splitting: false,
  minify: false,
  target: 'node20',
  outDir: 'dist',
})
