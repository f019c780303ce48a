import type { SectionStats } from '@docnav/types';
import type { DocumentIndex } from '../tree/document-index.js';
import { TokenCounter } from './token-counter.js';

/**
 * 全セクションのトークン統計を前順で集計
 *
 * subtreeTokens は自身と子孫の bodyTokens の合計。
 * get_node で足りるか get_node_with_children が必要かの判断材料になる。
 */
export function collectSectionStats(
  index: DocumentIndex,
  counter: TokenCounter = new TokenCounter()
): SectionStats[] {
  const stats: SectionStats[] = [];
  const bodyTokens = new Map<string, number>();

  for (const view of index.walk()) {
    const tokens = counter.count(view.bodyText);
    bodyTokens.set(view.identifier, tokens);
    stats.push({
      identifier: view.identifier,
      title: view.title,
      nestingLevel: view.nestingLevel,
      childCount: view.childCount,
      bodyTokens: tokens,
      subtreeTokens: 0,
    });
  }

  for (const entry of stats) {
    entry.subtreeTokens = index
      .subtreeIds(entry.identifier)
      .reduce((sum, identifier) => sum + (bodyTokens.get(identifier) ?? 0), 0);
  }

  return stats;
}
