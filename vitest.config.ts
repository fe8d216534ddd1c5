import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const sharedSrc = fileURLToPath(new URL('./packages/shared/src', import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
  },
  resolve: {
    alias: [
      { find: /^@chords-export\/shared\/(.*)$/, replacement: `${sharedSrc}/$1` },
      { find: '@chords-export/shared', replacement: `${sharedSrc}/index.ts` },
    ],
  },
});
