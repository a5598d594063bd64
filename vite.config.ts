import { defineConfig } from 'vite';
import dts from 'vite-plugin-dts';
import { fileURLToPath } from 'node:url';
import { builtinModules } from 'node:module';

const nodeBuiltins = [...builtinModules, ...builtinModules.map((m) => `node:${m}`)];

export default defineConfig({
  plugins: [
    dts({
      insertTypesEntry: true,
      rollupTypes: true,
      exclude: ['test/**', 'src/cli/**'],
    }),
  ],
  build: {
    outDir: 'dist/bundle',
    lib: {
      entry: fileURLToPath(new URL('src/index.ts', import.meta.url)),
      name: 'EchoProbe',
      formats: ['es', 'cjs'],
      fileName: (format) => `index.${format === 'es' ? 'js' : 'cjs'}`,
    },
    rollupOptions: {
      external: ['@noble/ciphers', '@noble/ciphers/utils.js', ...nodeBuiltins],
    },
    target: 'node20',
    sourcemap: true,
    minify: false,
  },
});
