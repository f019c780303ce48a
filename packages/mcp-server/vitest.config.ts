import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'mcp-server',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**',
    ],
    environment: 'node',
  },
});
