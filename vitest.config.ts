import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const packageEntry = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@scrivener/blog-core': packageEntry('blog-core'),
      '@scrivener/blog-node': packageEntry('blog-node'),
    },
  },
  test: {
    environment: 'node',
    // Vite exposes BASE_URL='/' on process.env; the blog reads BASE_URL as its site URL
    env: { BASE_URL: '' },
    include: ['packages/*/src/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    testTimeout: 15000,
  },
})
