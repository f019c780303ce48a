/**
 * コマンドライン引数解析のテスト
 */

import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { parseArgs } from '../args.js';

describe('MCP Server - コマンドライン引数解析', () => {
  it('文書パスをcwd基準の絶対パスにする', () => {
    const args = parseArgs(['node', 'server.js', 'docs/guide.md'], '0.1.0', '/work/project');

    expect(args.file).toBe(path.resolve('/work/project', 'docs/guide.md'));
    expect(args.docId).toBeUndefined();
    expect(args.config).toBeUndefined();
  });

  it('--doc-id と --config を受け取る', () => {
    const args = parseArgs(
      ['node', 'server.js', '/abs/guide.md', '--doc-id', 'guide', '--config', 'conf/.docnav.json'],
      '0.1.0'
    );

    expect(args.file).toBe(path.resolve('/abs/guide.md'));
    expect(args.docId).toBe('guide');
    expect(args.config).toBe('conf/.docnav.json');
  });
});
