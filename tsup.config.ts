import { defineConfig } from 'tsup'

export default defineConfig([
  // Library build (CJS + ESM)
  {
    entry: { index: 'src/index.ts' },
    format: ['cjs', 'esm'],
    dts: true,
    clean: true,
    outDir: 'dist',
    splitting: false,
    sourcemap: true,
    target: 'es2022',
    platform: 'node',
    outExtension({ format }) {
      return format === 'cjs' ? { js: '.cjs', dts: '.d.cts' } : { js: '.mjs', dts: '.d.ts' }
    },
  },
  // CLI build (CJS only; the shebang comes from the source)
  {
    entry: { 'cli/index': 'src/cli/index.ts' },
    format: ['cjs'],
    dts: false,
    outDir: 'dist',
    splitting: false,
    sourcemap: false,
    target: 'es2022',
    platform: 'node',
    outExtension() {
      return { js: '.cjs' }
    },
  },
])
