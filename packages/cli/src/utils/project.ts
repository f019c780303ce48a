/**
 * 文書の読み込みユーティリティ
 */

import * as path from 'path';
import { InvalidArgumentError } from '@docnav/core';
import { DocumentLoader, type LoadedDocument } from '@docnav/storage';
import type { OutputFormat } from '@docnav/types';

/**
 * 全コマンド共通のオプション
 */
export interface DocumentCommandOptions {
  /** 設定ファイルのパス */
  config?: string;
  /** 文書ID（省略時はプロジェクトルートからの相対パス） */
  docId?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * 設定を解決して文書を読み込む
 */
export async function openDocument(
  file: string,
  options: DocumentCommandOptions = {}
): Promise<{ loaded: LoadedDocument; loader: DocumentLoader }> {
  const cwd = options.cwd || process.cwd();
  const loader = await DocumentLoader.fromConfig({ configPath: options.config, cwd });
  const loaded = await loader.load(path.resolve(cwd, file), { documentId: options.docId });
  return { loaded, loader };
}

/**
 * --format オプションを検証
 */
export function parseFormat<T extends string = OutputFormat>(
  value: string | undefined,
  allowed: readonly T[],
  fallback: T
): T {
  if (value === undefined) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new InvalidArgumentError(`Unknown format: ${value} (expected ${allowed.join(', ')})`);
  }
  return match;
}

/**
 * --indent オプションを検証（0-8の整数）
 */
export function parseIndent(value: string): number {
  const indent = Number(value);
  if (!Number.isInteger(indent) || indent < 0 || indent > 8) {
    throw new InvalidArgumentError(`Indent must be an integer between 0 and 8: ${value}`);
  }
  return indent;
}
