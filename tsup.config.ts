import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  target: 'node20',
  outDir: 'dist',
  splitting: false,
  // Dependencies stay external for the CLI
  external: [
    'chalk',
    'commander',
    'fast-glob',
    'micromatch',
    'zod'
  ]
});
