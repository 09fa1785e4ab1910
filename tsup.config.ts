import { defineConfig } from 'tsup';

export default defineConfig({
  // Entry points - what to build
  entry: {
    cli: 'src/cli/index.ts',      // CLI entry -> dist/cli.js
    index: 'src/index.ts',         // Library entry -> dist/index.js
  },

  // Output format - ESM for modern Node.js
  format: ['esm'],

  // Generate TypeScript declaration files
  dts: true,

  sourcemap: true,

  // Clean dist/ before each build
  clean: true,

  target: 'node20',

  // Makes the CLI directly executable: ./dist/cli.js
  banner: {
    js: "#!/usr/bin/env node",
  },

  noExternal: [],

  // External packages (don't bundle these)
  external: [
    // Node.js built-ins
    'fs', 'path', 'os',
    // Dependencies (installed via npm, not bundled)
    'commander', 'chalk', 'ora', 'zod', 'dotenv', '@iarna/toml',
    'fast-glob', 'ignore', 'tree-sitter', 'tree-sitter-go',
  ],
});
