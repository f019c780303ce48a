/**
 * IndexStorageインターフェイス
 */

import type { DocumentIndexJson } from './section.js';

/**
 * 保存されたインデックス
 */
export interface StoredIndex {
  /** 文書ID（キー） */
  documentId: string;
  /** 元テキストとパーサ設定のハッシュ（内容の変更検知用） */
  sourceHash: string;
  /** 保存日時（ISO 8601形式） */
  savedAt: string;
  /** インデックスのJSON投影 */
  index: DocumentIndexJson;
}

export interface IndexStorage {
  /**
   * インデックスを保存
   */
  save(documentId: string, index: DocumentIndexJson, sourceHash: string): Promise<void>;

  /**
   * インデックスを取得
   */
  get(documentId: string): Promise<StoredIndex | null>;
}
