import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  // Workspace packages ship TypeScript sources, so they are bundled in
  noExternal: [/^@replay-editor\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
