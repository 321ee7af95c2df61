import { defineConfig } from 'vite';

export default defineConfig({
  build: {
    lib: {
      entry: 'src/lib.ts',
      formats: ['es'],
      fileName: 'shadermath',
    },
    target: 'es2022',
    outDir: 'dist/lib',
  },
});
