import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const packageEntry = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^oidc-keyring$/,
        replacement: packageEntry('./packages/oidc-keyring/src/index.ts'),
      },
      {
        find: /^oidc-keyring-test-helpers$/,
        replacement: packageEntry('./packages/test-helpers/src/index.ts'),
      },
    ],
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
  },
})
