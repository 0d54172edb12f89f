import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point
    index: 'src/index.ts',

    // =========================================================================
    // Granular entry points
    // =========================================================================
    errors: 'src/errors-entry.ts',
    testing: 'src/testing-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  platform: 'node',
  target: 'node20',
});
