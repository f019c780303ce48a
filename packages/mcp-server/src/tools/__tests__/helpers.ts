/**
 * ツールテスト用のデータ
 */

import { buildDocumentIndex, TokenCounter } from '@docnav/core';
import type { ToolResult } from '../types.js';

export const MANUAL = `# Manual
Intro text.

## Setup
Step one.

### Linux
apt install.

## FAQ
`;

export const RULE = '='.repeat(60);

export function createIndex() {
  return buildDocumentIndex('manual.md', MANUAL);
}

/**
 * 文字数をトークン数として数えるカウンター
 */
export class CharacterCounter extends TokenCounter {
  count(text: string): number {
    return text.length;
  }
}

/**
 * 結果の最初のテキストを取り出す
 */
export function textOf(result: ToolResult): string {
  const first = result.content[0];
  return first?.type === 'text' ? first.text : '';
}
