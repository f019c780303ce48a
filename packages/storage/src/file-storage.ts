/**
 * ファイルベースのIndexStorage実装
 */

import { promises as fs } from 'node:fs';
import { dirname, normalize, resolve, sep } from 'node:path';
import { z } from 'zod';
import type { DocumentIndexJson, IndexStorage, StoredIndex } from '@docnav/types';
import { InvalidArgumentError, InvalidProjectionError, parseProjection } from '@docnav/core';

/** 保存ファイルの外枠（index の中身は parseProjection で検証） */
const storedIndexSchema = z.object({
  documentId: z.string(),
  sourceHash: z.string(),
  savedAt: z.string(),
  index: z.unknown(),
});

export interface FileStorageOptions {
  /** ストレージのベースディレクトリ */
  basePath: string;
}

/**
 * ファイルベースのIndexStorage
 * 文書IDごとにJSONファイルとしてインデックスを保存
 */
export class FileIndexStorage implements IndexStorage {
  private basePath: string;

  constructor(options: FileStorageOptions) {
    this.basePath = resolve(normalize(options.basePath));
  }

  /**
   * インデックスを保存
   */
  async save(documentId: string, index: DocumentIndexJson, sourceHash: string): Promise<void> {
    const filePath = this.getFilePath(documentId);

    await fs.mkdir(dirname(filePath), { recursive: true });

    const stored: StoredIndex = {
      documentId,
      sourceHash,
      savedAt: new Date().toISOString(),
      index,
    };

    await fs.writeFile(filePath, JSON.stringify(stored, null, 2), 'utf-8');
  }

  /**
   * インデックスを取得
   * @throws InvalidProjectionError JSONとして読めない、または形が合わない場合
   */
  async get(documentId: string): Promise<StoredIndex | null> {
    const filePath = this.getFilePath(documentId);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    return parseStoredIndex(content, filePath);
  }

  /**
   * 文書IDから保存先のファイルパスを求める
   * ベースディレクトリの外を指すIDは拒否する
   */
  private getFilePath(documentId: string): string {
    const normalizedId = normalize(documentId).replace(/\\/g, '/');
    const filePath = resolve(this.basePath, `${normalizedId}.json`);

    if (!documentId || !filePath.startsWith(this.basePath + sep)) {
      throw new InvalidArgumentError(`Invalid document id for storage: "${documentId}"`);
    }

    return filePath;
  }
}

/**
 * 保存ファイルの内容を検証して StoredIndex にする
 */
function parseStoredIndex(content: string, filePath: string): StoredIndex {
  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidProjectionError(`Stored index is not valid JSON (${filePath}): ${reason}`);
  }

  const result = storedIndexSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new InvalidProjectionError(
      `Stored index has an unexpected shape${location} (${filePath}): ${issue?.message ?? 'unknown error'}`
    );
  }

  const { index, ...envelope } = result.data;
  return { ...envelope, index: parseProjection(index) };
}
