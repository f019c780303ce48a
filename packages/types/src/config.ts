/**
 * 設定ファイルの型定義
 */

export interface DocnavConfig {
  version: string;
  parser: ParserConfig;
  outline: OutlineConfig;
  storage: StorageConfig;
}

export interface ParserConfig {
  /** フェンスドコードブロック内の `#` 行を見出しとして扱わない */
  skipFencedCode: boolean;
  /** 見出しが1つもない文書をエラーにするか */
  requireHeadings: boolean;
  /** 見出しとして認識する最大レベル（1-6） */
  maxHeadingLevel: number;
}

export interface OutlineConfig {
  /** ネスト1段あたりのインデント幅（スペース数） */
  indent: number;
}

export interface StorageConfig {
  /** 構築済みインデックスをキャッシュするか */
  cacheEnabled: boolean;
  /** インデックスの保存パス（プロジェクトルートからの相対パス） */
  indexPath: string;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: DocnavConfig = {
  version: '1.0',
  parser: {
    skipFencedCode: true,
    requireHeadings: false,
    maxHeadingLevel: 6,
  },
  outline: {
    indent: 2,
  },
  storage: {
    cacheEnabled: false,
    indexPath: '.docnav/index',
  },
};
