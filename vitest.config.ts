import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // One project per workspace package, each with its own vitest.config.ts.
    projects: [
      'packages/errors',
      'packages/http',
      'packages/testing',
      'packages/personality-insights',
      'packages/natural-language-classifier',
    ],
  },
})
