/**
 * セクションのフラットな格納領域
 *
 * 子はインデックスで参照し、親への参照は持たない。
 * 祖先は識別子のプレフィックスから引く。
 */

export interface SectionRecord {
  readonly identifier: string;
  readonly title: string;
  /** 見出しレベル（`#` の数） */
  readonly depth: number;
  readonly bodyText: string;
  /** 子のアリーナ内インデックス（文書順） */
  readonly children: readonly number[];
}

export interface SectionArena {
  readonly nodes: readonly SectionRecord[];
  /** トップレベルのアリーナ内インデックス（文書順） */
  readonly roots: readonly number[];
}

/**
 * 識別子からツリー上の深さを求める
 */
export function nestingLevelOf(identifier: string): number {
  return identifier.split('.').length;
}

