import { defineConfig, mergeConfig } from 'vitest/config';

import baseConfig from './lambdas/vitest.base.config';

export default mergeConfig(
  baseConfig,
  defineConfig({
    test: {
      include: ['lambdas/**/src/**/*.test.ts'],
    },
  }),
);
