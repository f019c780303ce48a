/**
 * get_section_stats ツール
 * セクションごとのトークン数を取得する
 */

import { z } from 'zod';
import { collectSectionStats, TokenCounter, type DocumentIndex } from '@docnav/core';
import { textResult, withIdentifier } from '../utils.js';
import type { RegisteredTool, ToolRegistrationContext, ToolResult } from './types.js';

export interface SectionStatsArgs {
  /** 指定した場合はその部分木だけ */
  identifier?: string;
}

export function handleGetSectionStats(
  index: DocumentIndex,
  args: SectionStatsArgs,
  counter: TokenCounter = new TokenCounter()
): ToolResult {
  const stats = collectSectionStats(index, counter);
  const { identifier } = args;

  let selected = stats;
  if (identifier !== undefined) {
    const ids = new Set(withIdentifier(identifier, () => index.subtreeIds(identifier)));
    selected = stats.filter((entry) => ids.has(entry.identifier));
  }

  if (selected.length === 0) {
    return textResult('(見出しなし)');
  }

  const lines = selected.map(
    (entry) =>
      `[${entry.identifier}] ${entry.title} | 本文: ${entry.bodyTokens} tokens | 子孫込み: ${entry.subtreeTokens} tokens | 子: ${entry.childCount}`
  );
  return textResult(lines.join('\n'));
}

/**
 * get_section_stats ツールを登録
 */
export function registerSectionStatsTool(context: ToolRegistrationContext): RegisteredTool {
  const { server, index, counter } = context;

  return server.registerTool(
    'get_section_stats',
    {
      description:
        'セクションごとの本文トークン数と子孫込みのトークン数を取得します。get_node と get_node_with_children の使い分けに使ってください。',
      inputSchema: {
        identifier: z.string().min(1).optional().describe('部分木のルート（省略時は文書全体）'),
      },
    },
    async (args: SectionStatsArgs) => handleGetSectionStats(index, args, counter)
  );
}
