import { configDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['command-audit/src/**/*.test.ts'],
    exclude: [...configDefaults.exclude, 'output/**']
  }
});
