import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['bin/runbench.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
});
