import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { cli: 'src/cli.ts' },
  format: ['esm'],
  clean: true,
  platform: 'node',
  target: 'node20',
  noExternal: ['@bolab/shared'],
});
