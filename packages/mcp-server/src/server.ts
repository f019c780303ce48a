#!/usr/bin/env -S npx tsx
/**
 * docnav MCP Server
 * 1つのMarkdown文書を見出しツリーとしてエージェントに公開する
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createRequire } from 'module';
import { DocumentLoader } from '@docnav/storage';
import { parseArgs } from './args.js';
import { createDocnavServer } from './create-server.js';

// package.jsonからバージョンを読み込む
const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version: string };
const VERSION = packageJson.version;

/**
 * デバッグモードの判定
 */
const isDebugMode = process.env.DEBUG === '1' || process.env.NODE_ENV === 'development';

/**
 * デバッグログ出力（デバッグモード時のみ）
 * 標準出力はプロトコルが使うため標準エラーへ書く
 */
function debugLog(message: string): void {
  if (isDebugMode) {
    console.error(`[mcp-server] ${message}`);
  }
}

/**
 * メイン処理
 */
async function main() {
  const { file, docId, config } = parseArgs(process.argv, VERSION);
  debugLog(`Document: ${file}`);

  const loader = await DocumentLoader.fromConfig({ configPath: config });
  const loaded = await loader.load(file, { documentId: docId });
  debugLog(`Document ID: ${loaded.index.documentId}`);
  debugLog(`Sections: ${loaded.index.size} (from cache: ${loaded.fromCache ? 'YES' : 'NO'})`);

  const { server } = createDocnavServer(loaded.index, { version: VERSION });

  // サーバの起動
  const transport = new StdioServerTransport();
  debugLog('Starting MCP server...');
  await server.connect(transport);
  debugLog('MCP server started');
}

main().catch((error) => {
  console.error('[mcp-server] Server error:', error);
  process.exit(1);
});
