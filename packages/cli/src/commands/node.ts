/**
 * 個別セクションを対象とするコマンド
 * node / children
 */

import {
  formatAsJson,
  formatChildrenAsText,
  formatNodeAsHtml,
  formatNodeAsText,
} from '../utils/output.js';
import { openDocument, parseFormat, type DocumentCommandOptions } from '../utils/project.js';

const NODE_FORMATS = ['text', 'json', 'html'] as const;
const CHILDREN_FORMATS = ['text', 'json'] as const;

export interface NodeCommandOptions extends DocumentCommandOptions {
  /** 子孫セクションの本文も連結する */
  withChildren?: boolean;
  format?: string;
}

export interface ChildrenCommandOptions extends DocumentCommandOptions {
  format?: string;
}

/**
 * セクションを1件取得して整形
 */
export async function runNode(
  file: string,
  identifier: string,
  options: NodeCommandOptions = {}
): Promise<string> {
  const format = parseFormat(options.format, NODE_FORMATS, 'text');
  const { loaded } = await openDocument(file, options);

  const result = options.withChildren
    ? loaded.index.getNodeWithChildren(identifier)
    : loaded.index.getNode(identifier);

  switch (format) {
    case 'json':
      return formatAsJson(result);
    case 'html':
      return formatNodeAsHtml(result);
    case 'text':
      return formatNodeAsText(result);
  }
}

/**
 * 直下の子セクションの一覧
 */
export async function runChildren(
  file: string,
  identifier: string,
  options: ChildrenCommandOptions = {}
): Promise<string> {
  const format = parseFormat(options.format, CHILDREN_FORMATS, 'text');
  const { loaded } = await openDocument(file, options);
  const children = loaded.index.getChildren(identifier);

  return format === 'json' ? formatAsJson(children) : formatChildrenAsText(children);
}
