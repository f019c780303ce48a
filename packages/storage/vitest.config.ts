import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'storage',
    exclude: [
      '**/node_modules/**',
      '**/dist/**', // ビルド成果物を除外（重複実行を防止）
      '**/.{idea,git,cache,output,temp}/**',
    ],
    environment: 'node',
  },
});
