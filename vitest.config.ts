import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    clearMocks: true,
    unstubEnvs: true,
    restoreMocks: true,
    include: ['tests/**/*.test.ts'],
  },
});
