/**
 * MCPサーバの組み立て
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DocumentIndex, TokenCounter } from '@docnav/core';
import {
  registerGetChildrenTool,
  registerGetNodeTool,
  registerGetNodeWithChildrenTool,
  registerGetOutlineTool,
  registerSectionStatsTool,
} from './tools/index.js';

export interface CreateServerOptions {
  version: string;
  counter?: TokenCounter;
}

/**
 * 1文書を対象とするMCPサーバを作成し、全ツールを登録する
 */
export function createDocnavServer(
  index: DocumentIndex,
  options: CreateServerOptions
): { server: McpServer } {
  const server = new McpServer(
    {
      name: 'docnav',
      version: options.version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  const context = { server, index, counter: options.counter };

  registerGetOutlineTool(context);
  registerGetNodeTool(context);
  registerGetNodeWithChildrenTool(context);
  registerGetChildrenTool(context);
  registerSectionStatsTool(context);

  return { server };
}
