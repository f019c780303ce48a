import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cli',
    include: ['src/**/__tests__/**/*.test.ts'],
    testTimeout: 30000,

    // 出力設定: テスト失敗時のみ詳細を表示
    reporters: ['default'],

    environment: 'node',
  },
});
