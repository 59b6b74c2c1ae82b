import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      // Source imports use NodeNext-style .js specifiers; point them at the .ts files
      name: 'resolve-js-specifiers-to-ts',
      resolveId(source, importer) {
        if (source.startsWith('.') && source.endsWith('.js') && importer && !importer.includes('node_modules')) {
          return this.resolve(source.replace(/\.js$/, '.ts'), importer, { skipSelf: true });
        }
        return null;
      },
    },
  ],
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    globals: true,
    pool: 'forks',
    testTimeout: 10000,
  },
});
