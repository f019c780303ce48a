/**
 * 文書全体を対象とするコマンド
 * title / outline / ids / json
 */

import { formatAsJson } from '../utils/output.js';
import { openDocument, parseIndent, type DocumentCommandOptions } from '../utils/project.js';

export interface OutlineCommandOptions extends DocumentCommandOptions {
  /** インデント幅（省略時は設定ファイルの outline.indent） */
  indent?: string;
}

export interface JsonCommandOptions extends DocumentCommandOptions {
  compact?: boolean;
}

/**
 * 文書タイトルを返す
 * 深さ1の見出しがない場合は文書IDを使う
 */
export async function runTitle(file: string, options: DocumentCommandOptions = {}): Promise<string> {
  const { loaded } = await openDocument(file, options);
  return loaded.index.title() ?? loaded.index.documentId;
}

/**
 * アウトラインを返す
 */
export async function runOutline(file: string, options: OutlineCommandOptions = {}): Promise<string> {
  const { loaded, loader } = await openDocument(file, options);
  const indent = options.indent !== undefined ? parseIndent(options.indent) : loader.settings.outline.indent;
  const outline = loaded.index.outline({ indent });
  return outline || '(見出しなし)';
}

/**
 * 全ノードの識別子を文書順で返す
 */
export async function runIds(file: string, options: DocumentCommandOptions = {}): Promise<string> {
  const { loaded } = await openDocument(file, options);
  return loaded.index.nodeIds().join('\n');
}

/**
 * インデックスのJSON投影を返す
 */
export async function runJson(file: string, options: JsonCommandOptions = {}): Promise<string> {
  const { loaded } = await openDocument(file, options);
  return formatAsJson(loaded.index.toJSON(), options.compact);
}
