import { defineConfig } from 'vitest/config'

const verbose = process.env.VITEST_VERBOSE === 'true'

export default defineConfig({
  test: {
    name: 'scene-bridge',
    environment: 'node',
    globals: false,
    silent: !verbose,
    include: ['test/**/*.test.ts'],
  },
})
