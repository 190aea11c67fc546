/**
 * Vite configuration for CommonJS build
 * Output: dist/cjs/
 */

import { defineConfig } from 'vite'
import { fileURLToPath } from 'node:url'
import dts from 'vite-plugin-dts'

const root = (path: string): string => fileURLToPath(new URL(`../${path}`, import.meta.url))

export default defineConfig({
  plugins: [
    dts({
      include: ['src/lib/**/*'],
      outDir: 'dist/cjs',
      entryRoot: 'src/lib',
      rollupTypes: false,
      tsconfigPath: './tsconfig.build.json'
    })
  ],
  build: {
    lib: {
      entry: root('src/lib/index.ts'),
      formats: ['cjs'],
      fileName: () => 'index.cjs'
    },
    outDir: root('dist/cjs'),
    emptyOutDir: true,
    sourcemap: true,
    minify: false,
    rollupOptions: {
      output: {
        format: 'cjs',
        exports: 'named'
      }
    }
  }
})
