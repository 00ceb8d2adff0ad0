import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['cli/**/__tests__/**/*.test.ts'],
    unstubGlobals: true,
    unstubEnvs: true,
  },
});
