import { defineConfig } from 'vitest/config'
import react from '@vitejs/plugin-react'

export default defineConfig({
  plugins: [react()],
  test: {
    globals: true,
    environment: 'node',
    include: ['core/tests/**/*.test.ts', 'cli/tests/**/*.test.ts', 'frontend/tests/**/*.test.{ts,tsx}'],
    testTimeout: 10_000,
  },
})
