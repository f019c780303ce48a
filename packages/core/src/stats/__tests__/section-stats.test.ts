import { describe, it, expect } from 'vitest';
import { collectSectionStats } from '../section-stats.js';
import { TokenCounter } from '../token-counter.js';
import { TreeBuilder } from '../../parser/tree-builder.js';

/**
 * 文字数をトークン数とみなすカウンタ
 */
class CharacterCounter extends TokenCounter {
  count(text: string): number {
    return text.length;
  }
}

describe('collectSectionStats', () => {
  const index = new TreeBuilder().build('doc', '# A\naaaa\n## B\nbb\n### C\nc\n## D\n');

  it('前順で全セクションの統計を返す', () => {
    const stats = collectSectionStats(index, new CharacterCounter());

    expect(stats).toEqual([
      { identifier: '1', title: 'A', nestingLevel: 1, childCount: 2, bodyTokens: 4, subtreeTokens: 7 },
      { identifier: '1.1', title: 'B', nestingLevel: 2, childCount: 1, bodyTokens: 2, subtreeTokens: 3 },
      { identifier: '1.1.1', title: 'C', nestingLevel: 3, childCount: 0, bodyTokens: 1, subtreeTokens: 1 },
      { identifier: '1.2', title: 'D', nestingLevel: 2, childCount: 0, bodyTokens: 0, subtreeTokens: 0 },
    ]);
  });

  it('subtreeTokensは自身と子の合計', () => {
    const stats = collectSectionStats(index);
    const byId = new Map(stats.map((entry) => [entry.identifier, entry]));

    for (const entry of stats) {
      const childTotal = index
        .getChildren(entry.identifier)
        .reduce((sum, child) => sum + (byId.get(child.identifier)?.subtreeTokens ?? 0), 0);
      expect(entry.subtreeTokens).toBe(entry.bodyTokens + childTotal);
    }
  });

  it('ノード0件なら空配列', () => {
    expect(collectSectionStats(new TreeBuilder().build('doc', 'no headings'))).toEqual([]);
  });
});

describe('TokenCounter', () => {
  const counter = new TokenCounter();

  it('空文字列は0トークン', () => {
    expect(counter.count('')).toBe(0);
  });

  it('テキストのトークン数を数える', () => {
    expect(counter.count('The quick brown fox jumps over the lazy dog.')).toBeGreaterThan(0);
  });
});
