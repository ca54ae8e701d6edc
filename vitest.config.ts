import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const alias = {
  '@libs/http-client-core': fileURLToPath(new URL('./libs/http-client-core/src/index.ts', import.meta.url)),
  '@libs/acled-client': fileURLToPath(new URL('./libs/acled-client/src/index.ts', import.meta.url)),
};

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['libs/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
