import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Scheduler, transfers, tasks and Result primitives
    index: 'src/index.ts',

    // =========================================================================
    // Tools
    // =========================================================================
    testing: 'src/testing/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
});
