import path from 'node:path';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/*/src/**/*.{spec,test}.ts']
  },
  resolve: {
    alias: {
      '@arec/common': path.resolve(__dirname, 'services/common/src/index.ts')
    }
  }
});
