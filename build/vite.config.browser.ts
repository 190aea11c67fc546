/**
 * Vite configuration for Browser build (IIFE format)
 * Output: dist/browser/
 * Exposes the library as the global `Cobsr`.
 */

import { defineConfig } from 'vite'
import { fileURLToPath } from 'node:url'
import dts from 'vite-plugin-dts'

const root = (path: string): string => fileURLToPath(new URL(`../${path}`, import.meta.url))

export default defineConfig({
  plugins: [
    dts({
      include: ['src/lib/**/*'],
      outDir: 'dist/browser',
      entryRoot: 'src/lib',
      rollupTypes: false,
      tsconfigPath: './tsconfig.build.json'
    })
  ],
  build: {
    lib: {
      entry: root('src/lib/index.ts'),
      name: 'Cobsr',
      formats: ['iife'],
      fileName: () => 'cobsr.js'
    },
    outDir: root('dist/browser'),
    emptyOutDir: true,
    sourcemap: true,
    minify: false,
    rollupOptions: {
      output: {
        format: 'iife',
        name: 'Cobsr',
        exports: 'named'
      }
    }
  }
})
