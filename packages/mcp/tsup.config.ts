import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/sse.ts'],
  format: ['esm'],
  dts: false,
  outDir: 'dist',
  clean: true,
  // Workspace packages export TypeScript sources, so they are bundled in.
  noExternal: [/^@draftcast\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
