/**
 * Vitest Configuration
 *
 * Tests live under tests/ and import the library from src/.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
