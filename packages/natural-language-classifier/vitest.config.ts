import { defineProject } from 'vitest/config'

export default defineProject({
  test: {
    name: 'natural-language-classifier',
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
})
