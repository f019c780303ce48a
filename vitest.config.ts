import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // 各パッケージの vitest.config.ts をまとめて実行
    projects: ['packages/*'],
  },
});
