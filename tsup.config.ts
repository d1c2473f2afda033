import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  dts: {
    compilerOptions: {
      removeComments: true
    }
  },
  clean: true,
  splitting: false,
  treeshake: true,
  sourcemap: false
});
