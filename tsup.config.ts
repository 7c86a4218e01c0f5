import { defineConfig } from 'tsup';

export default defineConfig([
  // Library bundles
  {
    entry: {
      'index': 'src/index.ts',
      'schema/index': 'src/schema/index.ts',
      'generator/index': 'src/generator/index.ts',
      'samples/index': 'src/samples/index.ts',
    },
    format: ['cjs', 'esm'],
    dts: true,
    sourcemap: true,
    clean: true,
    splitting: false,
    treeshake: true,
    external: ['@faker-js/faker', 'zod'],
  },
  // CLI binary (CJS only, shebang kept from source)
  {
    entry: {
      'cli': 'src/cli.ts',
    },
    format: ['cjs'],
    dts: false,
    sourcemap: false,
    clean: false,
    splitting: false,
    external: ['@faker-js/faker', 'zod'],
  },
]);
