import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Core
    index: 'src/index.ts',
    // Framework integrations
    express: 'src/integrations/express.ts',
    lambda: 'src/integrations/lambda.ts',
    integrations: 'src/integrations/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  minify: true,
  treeshake: true,
  splitting: false,
  target: 'es2022',
  outDir: 'dist',
  platform: 'node',
  banner: {
    js: '/* @tracebatch/sdk - LLM trace ingestion */',
  },
});
