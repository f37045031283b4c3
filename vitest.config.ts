import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      // Source files import siblings with .js endings (NodeNext); map them back to .ts
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        if (source.startsWith('.') && source.endsWith('.js') && importer) {
          return this.resolve(source.replace(/\.js$/, '.ts'), importer, { skipSelf: true });
        }
        return null;
      },
    },
  ],
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    globals: true,
    pool: 'forks',
  },
});
