import { defineConfig, type TestUserConfig } from 'vitest/config'
import { unitTestMinimalProject } from './configs/vitest.config.unit-minimal.js'

export function getReporters(): TestUserConfig['reporters'] {
  if (process.env.GITHUB_ACTIONS) return ['default', 'github-actions']

  return ['default']
}

export default defineConfig({
  test: {
    projects: [
      {
        extends: true,
        ...unitTestMinimalProject,
      },
    ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**',
    ],
    env: {
      NODE_ENV: 'test',
    },
    clearMocks: true,
    // Socket teardown in the integration-style suites can lag behind the tests
    teardownTimeout: 5_000,
    testTimeout: 10_000,
    reporters: getReporters(),
    onConsoleLog: () => !process.env.TEST_QUIET_CONSOLE,
  },
})
