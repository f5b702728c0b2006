import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const resolvePackage = (path: string) =>
  fileURLToPath(new URL(`./packages/${path}`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@bfstream/core': resolvePackage('core/index.ts'),
      '@bfstream/types': resolvePackage('types/src/index.ts'),
      '@bfstream/engine': resolvePackage('engine/index.ts'),
      '@bfstream/io': resolvePackage('io/index.ts'),
    },
  },
  test: {
    include: [
      'packages/*/src/**/*.test.ts',
    ],
    environment: 'node',
  },
})
