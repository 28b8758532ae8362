/**
 * Vitest Configuration
 *
 * Tests live under tests/ and mirror src/. Lua fixtures are in tests/fixtures.
 *
 * Run with coverage:
 *   npm run test:coverage
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'lua-facade',
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/types/**'],
    },
  },
});
