import { defineConfig } from 'vitest/config'

const verbose = process.env.VITEST_VERBOSE === 'true'

export default defineConfig({
  test: {
    name: 'webgl-renderer',
    environment: 'node',
    globals: false,
    silent: !verbose,
    include: ['src/**/*.test.ts'],
  },
})
