import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages export their compiled dist/ to Node; tests run the sources.
function packageSource(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@stepwise/kernel': packageSource('kernel'),
      '@stepwise/runtime-host': packageSource('runtime-host'),
      '@stepwise/module-loader': packageSource('module-loader'),
      '@stepwise/cli': packageSource('cli'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
