import { defineConfig } from 'tsup';

export default defineConfig([
  // Core entry point
  {
    entry: { index: 'src/index.ts' },
    format: ['esm', 'cjs'],
    dts: true,
    clean: true,
    outDir: 'dist/bundle',
  },
  // Logger subpath export
  {
    entry: { logger: 'src/logger/index.ts' },
    format: ['esm', 'cjs'],
    dts: true,
    outDir: 'dist/bundle',
  },
  // Themes and sinks subpath exports
  {
    entry: { themes: 'src/themes/index.ts', sinks: 'src/sinks/index.ts' },
    format: ['esm', 'cjs'],
    dts: true,
    outDir: 'dist/bundle',
  },
]);
