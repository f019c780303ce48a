/**
 * ツール登録のエクスポート
 */

export { registerGetOutlineTool, handleGetOutline } from './get-outline.js';
export {
  registerGetNodeTool,
  registerGetNodeWithChildrenTool,
  handleGetNode,
  handleGetNodeWithChildren,
} from './get-node.js';
export { registerGetChildrenTool, handleGetChildren } from './get-children.js';
export { registerSectionStatsTool, handleGetSectionStats, type SectionStatsArgs } from './section-stats.js';

export type { ToolRegistrationContext, RegisteredTool, ToolResult, IdentifierArgs } from './types.js';
