import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const packageEntry = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@hrm/types': packageEntry('types'),
      '@hrm/core': packageEntry('core'),
      '@hrm/vm': packageEntry('vm'),
      '@hrm/compiler': packageEntry('compiler'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
})
