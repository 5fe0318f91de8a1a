import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // 纯内存实现，无需浏览器环境
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
  },
});
