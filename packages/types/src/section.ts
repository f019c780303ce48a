/**
 * セクションツリーの型定義
 *
 * Note: JSON投影はそのまま永続化・転送されるため、フィールドはすべてプリミティブと配列のみ
 */

/**
 * セクションノードのJSON表現（再帰構造）
 */
export interface SectionNodeJson {
  /** 階層的な識別子（例: "2.3.1"） */
  identifier: string;
  /** 見出しテキスト（マーカーと前後の空白を除去済み） */
  title: string;
  /** 見出しレベル（1-6、`#` の数） */
  depth: number;
  /** 見出し直下の本文 */
  bodyText: string;
  /** 子セクション（文書順） */
  children: SectionNodeJson[];
}

/**
 * DocumentIndex全体のJSON表現
 */
export interface DocumentIndexJson {
  /** 呼び出し側が指定した文書ID */
  documentId: string;
  /** 文書タイトル（最初のH1、なければ省略） */
  title?: string;
  /** トップレベルのセクション（文書順） */
  nodes: SectionNodeJson[];
}

/**
 * 走査時に渡されるセクションのビュー
 */
export interface SectionView {
  identifier: string;
  title: string;
  depth: number;
  bodyText: string;
  /** ツリー上の深さ（識別子のセグメント数） */
  nestingLevel: number;
  childCount: number;
}
