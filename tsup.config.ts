import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/main/main.ts', 'src/main/installer.ts'],
  outDir: 'dist',
  format: ['cjs'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: true,
  splitting: false
});
