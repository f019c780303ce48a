/**
 * クエリ結果の型定義
 */

/**
 * get_node / get_node_with_children の結果
 */
export interface NodeResult {
  identifier: string;
  title: string;
  /** 本文（get_node_with_children では子孫の本文を連結したもの） */
  text: string;
  /** 見出しレベル（生の `#` の数） */
  depth: number;
  /** 祖先のタイトル + 自身のタイトル（ルート側から順に） */
  breadcrumb: string[];
}

/**
 * get_children の結果要素
 */
export interface ChildEntry {
  identifier: string;
  title: string;
}

/**
 * セクションごとのトークン統計
 */
export interface SectionStats {
  identifier: string;
  title: string;
  nestingLevel: number;
  childCount: number;
  /** 自身の本文のトークン数 */
  bodyTokens: number;
  /** 自身と全子孫の本文トークン数の合計 */
  subtreeTokens: number;
}

/**
 * 出力形式
 */
export type OutputFormat = 'text' | 'json';
