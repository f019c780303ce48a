/**
 * 文書ファイルの読み込みとインデックス構築
 */

import { readFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import * as path from 'node:path';
import type { DocnavConfig, IndexStorage, ParserConfig } from '@docnav/types';
import { ConfigLoader } from '@docnav/types';
import { DocumentIndex, DocumentReadError, InvalidProjectionError, TreeBuilder } from '@docnav/core';
import { FileIndexStorage } from './file-storage.js';

export interface DocumentLoaderOptions {
  config: DocnavConfig;
  /** 文書IDとキャッシュ保存先の基準ディレクトリ */
  projectRoot: string;
  /** キャッシュ用ストレージ（省略時は storage.indexPath のFileIndexStorage） */
  storage?: IndexStorage;
}

export interface LoadOptions {
  /** 文書ID（省略時はプロジェクトルートからの相対パス） */
  documentId?: string;
}

export interface LoadedDocument {
  index: DocumentIndex;
  /** 読み込んだファイルの絶対パス */
  path: string;
  /** キャッシュから復元したか */
  fromCache: boolean;
}

/**
 * 文書ファイルをテキストとして読み込む
 * @throws DocumentReadError
 */
export async function loadDocumentText(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DocumentReadError(filePath, error);
  }
}

/**
 * 元テキストとパーサ設定からキャッシュ照合用のハッシュを計算
 */
export function computeSourceHash(text: string, parser: ParserConfig): string {
  return createHash('sha256')
    .update(JSON.stringify(parser))
    .update('\n')
    .update(text)
    .digest('hex');
}

/**
 * 文書ローダー
 *
 * storage.cacheEnabled が有効な場合、元テキストのハッシュが一致する限り
 * 保存済みのJSON投影から復元し、それ以外は構築し直して保存する。
 */
export class DocumentLoader {
  private readonly config: DocnavConfig;
  private readonly projectRoot: string;
  private readonly storage: IndexStorage;
  private readonly builder: TreeBuilder;

  constructor(options: DocumentLoaderOptions) {
    this.config = options.config;
    this.projectRoot = path.resolve(options.projectRoot);
    this.storage =
      options.storage ??
      new FileIndexStorage({ basePath: path.join(this.projectRoot, options.config.storage.indexPath) });
    this.builder = new TreeBuilder(options.config.parser);
  }

  /**
   * 設定ファイルを解決してローダーを作成
   */
  static async fromConfig(options: { configPath?: string; cwd?: string } = {}): Promise<DocumentLoader> {
    const { config, projectRoot } = await ConfigLoader.resolve(options);
    return new DocumentLoader({ config, projectRoot });
  }

  get settings(): DocnavConfig {
    return this.config;
  }

  /**
   * ファイルパスから文書IDを決める
   * プロジェクトルート配下なら相対パス、外ならファイル名
   */
  documentIdFor(filePath: string): string {
    const absolutePath = path.resolve(filePath);
    const relativePath = path.relative(this.projectRoot, absolutePath);

    if (!relativePath || relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
      return path.basename(absolutePath);
    }
    return relativePath.split(path.sep).join('/');
  }

  /**
   * 文書を読み込んでインデックスを返す
   * @throws DocumentReadError ファイルが読めない場合
   */
  async load(filePath: string, options: LoadOptions = {}): Promise<LoadedDocument> {
    const absolutePath = path.resolve(filePath);
    const documentId = options.documentId || this.documentIdFor(absolutePath);
    const text = await loadDocumentText(absolutePath);

    if (!this.config.storage.cacheEnabled) {
      return { index: this.builder.build(documentId, text), path: absolutePath, fromCache: false };
    }

    const sourceHash = computeSourceHash(text, this.config.parser);
    const cached = await this.restore(documentId, sourceHash);
    if (cached) {
      return { index: cached, path: absolutePath, fromCache: true };
    }

    const index = this.builder.build(documentId, text);
    await this.storage.save(documentId, index.toJSON(), sourceHash);
    return { index, path: absolutePath, fromCache: false };
  }

  /**
   * ハッシュが一致するキャッシュがあれば復元
   */
  private async restore(documentId: string, sourceHash: string): Promise<DocumentIndex | null> {
    try {
      const stored = await this.storage.get(documentId);
      if (!stored || stored.sourceHash !== sourceHash) {
        return null;
      }
      return DocumentIndex.fromJSON(stored.index);
    } catch (error) {
      if (error instanceof InvalidProjectionError) {
        // 壊れたキャッシュは作り直す
        console.warn(`[storage] Discarding cached index for ${documentId}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
