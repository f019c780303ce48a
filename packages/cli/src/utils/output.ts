/**
 * 出力フォーマットユーティリティ
 */

import { marked } from 'marked';
import type { ChildEntry, NodeResult, SectionStats } from '@docnav/types';

const RULE = '='.repeat(60);

/**
 * 値を整形済みJSONとして出力
 */
export function formatAsJson(value: unknown, compact: boolean = false): string {
  return compact ? JSON.stringify(value) : JSON.stringify(value, null, 2);
}

/**
 * 見出しレベルを分かりやすいラベルに変換
 */
export function getDepthLabel(depth: number): string {
  return `H${depth}`;
}

/**
 * ノードをテキスト形式で出力
 */
export function formatNodeAsText(result: NodeResult): string {
  const lines: string[] = [];

  lines.push(`[${result.identifier}] ${result.title}`);
  lines.push(`Path: ${result.breadcrumb.join(' > ')} | Level: ${getDepthLabel(result.depth)}`);
  lines.push(RULE);
  lines.push(result.text || '(本文なし)');
  lines.push(RULE);

  return lines.join('\n');
}

/**
 * ノードをHTMLとして出力（見出し + 本文をMarkdownとしてレンダリング）
 */
export function formatNodeAsHtml(result: NodeResult): string {
  const source = `${'#'.repeat(result.depth)} ${result.title}\n\n${result.text}`;
  return marked.parser(marked.lexer(source)).trimEnd();
}

/**
 * 子セクション一覧をテキスト形式で出力
 */
export function formatChildrenAsText(children: ChildEntry[]): string {
  if (children.length === 0) {
    return '(子セクションなし)';
  }
  return children.map((child) => `[${child.identifier}] ${child.title}`).join('\n');
}

/**
 * セクション統計をテキスト形式で出力
 */
export function formatStatsAsText(stats: SectionStats[], indent: number = 2): string {
  if (stats.length === 0) {
    return '(セクションなし)';
  }

  return stats
    .map((entry) => {
      const padding = ' '.repeat(indent * (entry.nestingLevel - 1));
      return `${padding}[${entry.identifier}] ${entry.title} (body: ${entry.bodyTokens} tokens, subtree: ${entry.subtreeTokens} tokens)`;
    })
    .join('\n');
}
