/**
 * @docnav/core
 * 見出しツリーの構築とクエリ
 */

export { TreeBuilder, buildDocumentIndex, trimBlankLines } from './parser/tree-builder.js';
export {
  classifyLines,
  parseHeading,
  splitLines,
  type ClassifiedLine,
  type LineClassifierOptions,
} from './parser/line-classifier.js';
export { DocumentIndex, SUBTREE_SEPARATOR } from './tree/document-index.js';
export type { SectionArena, SectionRecord } from './tree/arena.js';
export { nestingLevelOf } from './tree/arena.js';
export { IDENTIFIER_PATTERN, parseProjection } from './tree/projection.js';
export { TokenCounter } from './stats/token-counter.js';
export { collectSectionStats } from './stats/section-stats.js';
export {
  DocnavError,
  EmptyDocumentError,
  NodeNotFoundError,
  DocumentReadError,
  InvalidArgumentError,
  InvalidProjectionError,
  type DocnavErrorCode,
} from './errors.js';
