/**
 * 共通ユーティリティ関数
 */

import { NodeNotFoundError } from '@docnav/core';
import type { NodeResult } from '@docnav/types';
import type { ToolResult } from './tools/types.js';

/**
 * テキスト1件のツール結果を作る
 */
export function textResult(text: string): ToolResult {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}

/**
 * インデックス操作を実行し、見つからない識別子をエージェント向けのエラーに変換
 */
export function withIdentifier<T>(identifier: string, operation: () => T): T {
  try {
    return operation();
  } catch (error) {
    if (error instanceof NodeNotFoundError) {
      throw new Error(
        `セクション "${identifier}" が見つかりません。get_outline で有効な識別子を確認してください。`
      );
    }
    throw error;
  }
}

/**
 * ノードを本文付きで整形
 */
export function formatNode(result: NodeResult): string {
  let text = `セクション: [${result.identifier}] ${result.title}\n`;
  text += `パス: ${result.breadcrumb.join(' > ')} | Level: H${result.depth}\n\n`;
  text += `内容:\n${'='.repeat(60)}\n`;
  text += result.text || '(本文なし)';
  text += `\n${'='.repeat(60)}`;
  return text;
}
