/**
 * get_node / get_node_with_children ツール
 * セクションの本文を取得する
 */

import { z } from 'zod';
import type { DocumentIndex } from '@docnav/core';
import { formatNode, textResult, withIdentifier } from '../utils.js';
import type { IdentifierArgs, RegisteredTool, ToolRegistrationContext, ToolResult } from './types.js';

const identifierSchema = z.string().min(1).describe('セクション識別子（get_outline の [1.2] など）');

export function handleGetNode(index: DocumentIndex, args: IdentifierArgs): ToolResult {
  const node = withIdentifier(args.identifier, () => index.getNode(args.identifier));
  return textResult(formatNode(node));
}

export function handleGetNodeWithChildren(index: DocumentIndex, args: IdentifierArgs): ToolResult {
  const node = withIdentifier(args.identifier, () => index.getNodeWithChildren(args.identifier));
  return textResult(formatNode(node));
}

/**
 * get_node ツールを登録
 */
export function registerGetNodeTool(context: ToolRegistrationContext): RegisteredTool {
  const { server, index } = context;

  return server.registerTool(
    'get_node',
    {
      description: 'セクション1件の本文を取得します。子セクションの本文は含みません。',
      inputSchema: {
        identifier: identifierSchema,
      },
    },
    async (args: IdentifierArgs) => handleGetNode(index, args)
  );
}

/**
 * get_node_with_children ツールを登録
 */
export function registerGetNodeWithChildrenTool(context: ToolRegistrationContext): RegisteredTool {
  const { server, index } = context;

  return server.registerTool(
    'get_node_with_children',
    {
      description:
        'セクションとその全子孫の本文を文書順に連結して取得します。大きな章は get_section_stats でトークン数を確認してから使ってください。',
      inputSchema: {
        identifier: identifierSchema,
      },
    },
    async (args: IdentifierArgs) => handleGetNodeWithChildren(index, args)
  );
}
