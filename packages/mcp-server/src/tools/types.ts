/**
 * ツール登録の共通型定義
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { DocumentIndex, TokenCounter } from '@docnav/core';

/**
 * 登録されたツールのハンドル
 * registerTool()の戻り値の型
 */
export type RegisteredTool = ReturnType<McpServer['registerTool']>;

/**
 * ツールの戻り値
 */
export type ToolResult = CallToolResult;

/**
 * ツール登録コンテキスト
 */
export interface ToolRegistrationContext {
  /** MCPサーバインスタンス */
  server: McpServer;
  /** 対象文書のインデックス */
  index: DocumentIndex;
  /** トークン数の計測（get_section_stats用） */
  counter?: TokenCounter;
}

/**
 * 識別子を受け取るツールの引数
 */
export interface IdentifierArgs {
  identifier: string;
}
