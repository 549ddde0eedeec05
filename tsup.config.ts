import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'release-cli': 'src/main/cli/release-cli.ts',
    'update-cli': 'src/main/cli/update-cli.ts'
  },
  outDir: 'dist/main',
  format: ['cjs'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: true,
  splitting: false,
  banner: {
    js: '#!/usr/bin/env node'
  }
});
