import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  // Bundle the @rigkeeper/* workspace packages so the binary is self-contained.
  noExternal: [/^@rigkeeper\//],
});
