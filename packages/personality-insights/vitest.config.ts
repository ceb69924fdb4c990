import { defineProject } from 'vitest/config'

export default defineProject({
  test: {
    name: 'personality-insights',
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
})
