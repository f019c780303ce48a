import type { ParserConfig } from '@docnav/types';
import { DEFAULT_CONFIG } from '@docnav/types';
import { EmptyDocumentError, InvalidArgumentError } from '../errors.js';
import type { SectionArena } from '../tree/arena.js';
import { DocumentIndex } from '../tree/document-index.js';
import { classifyLines, type ClassifiedLine } from './line-classifier.js';

interface PendingSection {
  identifier: string;
  title: string;
  depth: number;
  lines: string[];
  children: number[];
}

/**
 * 畳み込みの途中状態
 */
interface BuildState {
  sections: PendingSection[];
  roots: number[];
  /** 開いている祖先のインデックス（末尾が本文の蓄積先） */
  open: number[];
}

/**
 * 見出し構造のテキストからDocumentIndexを構築するクラス
 *
 * 見出しレベルが飛んでも（H1の直後にH3など）ネストは1段だけ深くなる。
 * 識別子はツリー上の位置から決まり、生の見出しレベルは使わない。
 * 最初の見出しより前の本文はどのセクションにも属さないため捨てる。
 */
export class TreeBuilder {
  private readonly config: ParserConfig;

  constructor(config: Partial<ParserConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG.parser, ...config };
  }

  /**
   * テキストからインデックスを構築
   * @param documentId 文書ID（空文字は不可）
   * @param text 見出し構造のテキスト（Markdown）
   * @throws EmptyDocumentError requireHeadings が有効で見出しがない場合
   */
  build(documentId: string, text: string): DocumentIndex {
    if (!documentId) {
      throw new InvalidArgumentError('documentId must be a non-empty string');
    }

    const arena = this.buildArena(text);

    if (arena.nodes.length === 0 && this.config.requireHeadings) {
      throw new EmptyDocumentError(documentId);
    }

    return new DocumentIndex(documentId, arena);
  }

  /**
   * 分類済みの行を畳み込んでアリーナを作る
   */
  buildArena(text: string): SectionArena {
    const state: BuildState = { sections: [], roots: [], open: [] };

    for (const line of classifyLines(text, this.config)) {
      this.apply(state, line);
    }

    return {
      nodes: state.sections.map((section) => ({
        identifier: section.identifier,
        title: section.title,
        depth: section.depth,
        bodyText: trimBlankLines(section.lines),
        children: section.children,
      })),
      roots: state.roots,
    };
  }

  private apply(state: BuildState, line: ClassifiedLine): void {
    if (line.kind === 'content') {
      const current = state.open[state.open.length - 1];
      if (current !== undefined) {
        state.sections[current].lines.push(line.text);
      }
      return;
    }

    // 同じか浅いレベルの見出しまで閉じる
    while (state.open.length > 0) {
      const top = state.sections[state.open[state.open.length - 1]];
      if (top.depth < line.level) {
        break;
      }
      state.open.pop();
    }

    const parentIndex = state.open[state.open.length - 1];
    const index = state.sections.length;
    let identifier: string;

    if (parentIndex === undefined) {
      state.roots.push(index);
      identifier = String(state.roots.length);
    } else {
      const parent = state.sections[parentIndex];
      parent.children.push(index);
      identifier = `${parent.identifier}.${parent.children.length}`;
    }

    state.sections.push({
      identifier,
      title: line.title,
      depth: line.level,
      lines: [],
      children: [],
    });
    state.open.push(index);
  }
}

/**
 * 前後の空行（空白のみの行を含む）を除いて連結
 */
export function trimBlankLines(lines: string[]): string {
  let start = 0;
  let end = lines.length;

  while (start < end && lines[start].trim() === '') {
    start++;
  }
  while (end > start && lines[end - 1].trim() === '') {
    end--;
  }

  return lines.slice(start, end).join('\n');
}

/**
 * テキストからDocumentIndexを構築するショートカット
 */
export function buildDocumentIndex(
  documentId: string,
  text: string,
  config: Partial<ParserConfig> = {}
): DocumentIndex {
  return new TreeBuilder(config).build(documentId, text);
}
