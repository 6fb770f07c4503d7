import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['index.ts', 'main.ts'],
  format: ['esm', 'cjs'],
  sourcemap: true,
  clean: true,
  dts: true,
});
