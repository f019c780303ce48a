/**
 * get_outline ツール
 * 文書のアウトラインを取得する
 */

import type { DocumentIndex } from '@docnav/core';
import { textResult } from '../utils.js';
import type { RegisteredTool, ToolRegistrationContext, ToolResult } from './types.js';

/**
 * アウトラインをエージェント向けに整形
 */
export function handleGetOutline(index: DocumentIndex): ToolResult {
  let text = `文書: ${index.documentId}\n`;
  text += `タイトル: ${index.title() ?? '(なし)'}\n`;
  text += `セクション数: ${index.size}\n\n`;
  text += index.size > 0 ? index.outline() : '(見出しなし)';
  return textResult(text);
}

/**
 * get_outline ツールを登録
 */
export function registerGetOutlineTool(context: ToolRegistrationContext): RegisteredTool {
  const { server, index } = context;

  return server.registerTool(
    'get_outline',
    {
      description:
        '文書の見出しアウトラインを取得します。各行の [1.2] などの識別子を get_node / get_children に渡してください。',
    },
    async () => handleGetOutline(index)
  );
}
