import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'url'

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/automated/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 30000,
    hookTimeout: 10000,
    sequence: {
      shuffle: false,
    },
  },
  resolve: {
    alias: {
      '@loopwatch/types':             pkg('types'),
      '@loopwatch/event-bus':         pkg('event-bus'),
      '@loopwatch/telemetry-sampler': pkg('telemetry-sampler'),
      '@loopwatch/scenario-runner':   pkg('scenario-runner'),
      '@loopwatch/analyzer':          pkg('analyzer'),
      '@loopwatch/run-store':         pkg('run-store'),
      '@loopwatch/harness-core':      pkg('harness-core'),
    },
  },
})
