import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Lowers standard decorators, which Node.js 20 cannot parse
  esbuild: {
    target: 'es2022'
  },
  resolve: {
    alias: {
      '~': fileURLToPath(new URL('./src', import.meta.url)),
      veneer: fileURLToPath(new URL('./src/index.ts', import.meta.url))
    }
  },
  test: {
    globals: true,
    include: ['tests/**/*.spec.ts']
  }
});
