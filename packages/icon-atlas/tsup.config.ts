import { defineConfig } from 'tsup'

export default defineConfig([
  // Library build
  {
    name: 'library',
    entry: ['src/index.ts'],
    format: ['esm'],
    dts: {
      resolve: true,
      compilerOptions: {
        skipLibCheck: true,
      },
    },
    splitting: false,
    sourcemap: true,
    clean: true,
    minify: false,
    treeshake: true,
    outDir: 'dist',
    external: ['sharp', '@resvg/resvg-js'],
  },
  // CLI build
  {
    name: 'cli',
    entry: ['src/cli.ts'],
    format: ['esm'],
    splitting: false,
    sourcemap: true,
    clean: false,
    minify: false,
    outDir: 'dist',
    external: ['sharp', '@resvg/resvg-js'],
  },
])
