import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    setupFiles: ['src/setupTests.ts'],
    // Frame fixtures are full 640x480 rasters; leave headroom on slow CI boxes.
    testTimeout: 30000,
    // sharp is a native add-on; keep it in one child process
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    fileParallelism: false,
  },
})
