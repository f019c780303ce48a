/**
 * get_children ツール
 * 直下の子セクションの一覧を取得する
 */

import { z } from 'zod';
import type { DocumentIndex } from '@docnav/core';
import { textResult, withIdentifier } from '../utils.js';
import type { IdentifierArgs, RegisteredTool, ToolRegistrationContext, ToolResult } from './types.js';

export function handleGetChildren(index: DocumentIndex, args: IdentifierArgs): ToolResult {
  const children = withIdentifier(args.identifier, () => index.getChildren(args.identifier));

  if (children.length === 0) {
    return textResult(`[${args.identifier}] には子セクションがありません。`);
  }

  const lines = children.map((child) => `[${child.identifier}] ${child.title}`);
  return textResult(`[${args.identifier}] の子セクション: ${children.length}件\n\n${lines.join('\n')}`);
}

/**
 * get_children ツールを登録
 */
export function registerGetChildrenTool(context: ToolRegistrationContext): RegisteredTool {
  const { server, index } = context;

  return server.registerTool(
    'get_children',
    {
      description: '直下の子セクションの識別子とタイトルを取得します（孫以降は含みません）。',
      inputSchema: {
        identifier: z.string().min(1).describe('親セクションの識別子'),
      },
    },
    async (args: IdentifierArgs) => handleGetChildren(index, args)
  );
}
