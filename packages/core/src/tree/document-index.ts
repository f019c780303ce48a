import type {
  ChildEntry,
  DocumentIndexJson,
  NodeResult,
  OutlineConfig,
  SectionNodeJson,
  SectionView,
} from '@docnav/types';
import { DEFAULT_CONFIG } from '@docnav/types';
import { InvalidArgumentError, InvalidProjectionError, NodeNotFoundError } from '../errors.js';
import type { SectionArena, SectionRecord } from './arena.js';
import { nestingLevelOf } from './arena.js';
import { parseProjection, projectionToArena } from './projection.js';

/** get_node_with_children で本文同士を区切る文字列 */
export const SUBTREE_SEPARATOR = '\n\n';

/**
 * 見出しツリーのインデックス
 *
 * 構築後は不変。アリーナと識別子→インデックスの対応表を持ち、
 * すべてのクエリは読み取りのみで完結する。
 *
 * @example
 * ```ts
 * const index = new TreeBuilder().build('guide', markdown);
 * console.log(index.outline());
 * // [1] Introduction
 * //   [1.1] Background
 * const node = index.getNode('1.1');
 * ```
 */
export class DocumentIndex implements Iterable<string> {
  private readonly nodes: readonly SectionRecord[];
  private readonly roots: readonly number[];
  private readonly lookup: ReadonlyMap<string, number>;
  /** 前順走査でのアリーナ内インデックス */
  private readonly order: readonly number[];

  /**
   * アリーナからインデックスを構築
   * 識別子が兄弟順の連番・親のプレフィックスになっていない場合はInvalidProjectionError
   */
  constructor(
    readonly documentId: string,
    arena: SectionArena
  ) {
    if (!documentId) {
      throw new InvalidArgumentError('documentId must be a non-empty string');
    }

    this.nodes = Object.freeze(
      arena.nodes.map((node) => Object.freeze({ ...node, children: Object.freeze([...node.children]) }))
    );
    this.roots = Object.freeze([...arena.roots]);

    const lookup = new Map<string, number>();
    const order: number[] = [];

    // 前順走査（子を逆順に積む）
    const stack: Array<{ index: number; expected: string }> = [];
    for (let i = this.roots.length - 1; i >= 0; i--) {
      stack.push({ index: this.roots[i], expected: String(i + 1) });
    }

    for (let entry = stack.pop(); entry !== undefined; entry = stack.pop()) {
      const { index, expected } = entry;
      const node = this.nodes[index];

      if (node === undefined) {
        throw new InvalidProjectionError(`Section reference ${index} is out of range`);
      }
      if (node.identifier !== expected) {
        throw new InvalidProjectionError(
          `Section "${node.title}" has identifier ${node.identifier}, expected ${expected}`
        );
      }
      if (lookup.has(node.identifier)) {
        throw new InvalidProjectionError(`Section ${node.identifier} is referenced more than once`);
      }

      lookup.set(node.identifier, index);
      order.push(index);

      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push({ index: node.children[i], expected: `${node.identifier}.${i + 1}` });
      }
    }

    this.lookup = lookup;
    this.order = Object.freeze(order);
  }

  /**
   * JSON投影からインデックスを復元
   */
  static fromJSON(value: unknown): DocumentIndex {
    const projection = parseProjection(value);
    return new DocumentIndex(projection.documentId, projectionToArena(projection));
  }

  /** ノード数 */
  get size(): number {
    return this.order.length;
  }

  /**
   * 文書タイトル（前順で最初のH1、なければundefined）
   */
  title(): string | undefined {
    for (const index of this.order) {
      const node = this.nodes[index];
      if (node.depth === 1) {
        return node.title;
      }
    }
    return undefined;
  }

  /**
   * LLM向けのアウトライン
   *
   * ```
   * [1] Introduction
   *   [1.1] Background
   *   [1.2] Goals
   * ```
   */
  outline(options: Partial<OutlineConfig> = {}): string {
    const indent = options.indent ?? DEFAULT_CONFIG.outline.indent;
    const lines: string[] = [];

    for (const view of this.walk()) {
      const padding = ' '.repeat(indent * (view.nestingLevel - 1));
      lines.push(`${padding}[${view.identifier}] ${view.title}`);
    }

    return lines.join('\n');
  }

  /**
   * 全識別子（前順）
   */
  nodeIds(): string[] {
    return this.order.map((index) => this.nodes[index].identifier);
  }

  *[Symbol.iterator](): Iterator<string> {
    for (const index of this.order) {
      yield this.nodes[index].identifier;
    }
  }

  has(identifier: string): boolean {
    return this.lookup.has(identifier);
  }

  /**
   * ノードを1件取得
   * @throws NodeNotFoundError
   */
  getNode(identifier: string): NodeResult {
    const node = this.nodes[this.resolve(identifier)];
    return {
      identifier: node.identifier,
      title: node.title,
      text: node.bodyText,
      depth: node.depth,
      breadcrumb: this.breadcrumb(node.identifier),
    };
  }

  /**
   * 直下の子の一覧（孫以降は含まない）
   * @throws NodeNotFoundError
   */
  getChildren(identifier: string): ChildEntry[] {
    const node = this.nodes[this.resolve(identifier)];
    return node.children.map((childIndex) => {
      const child = this.nodes[childIndex];
      return { identifier: child.identifier, title: child.title };
    });
  }

  /**
   * ノードと全子孫の本文を前順で連結して取得
   * 空の本文は飛ばす
   * @throws NodeNotFoundError
   */
  getNodeWithChildren(identifier: string): NodeResult {
    const rootIndex = this.resolve(identifier);
    const node = this.nodes[rootIndex];

    const text = this.subtree(rootIndex)
      .map((index) => this.nodes[index].bodyText)
      .filter((body) => body !== '')
      .join(SUBTREE_SEPARATOR);

    return {
      identifier: node.identifier,
      title: node.title,
      text,
      depth: node.depth,
      breadcrumb: this.breadcrumb(node.identifier),
    };
  }

  /**
   * 全セクションを前順で走査
   */
  *walk(): Generator<SectionView> {
    for (const index of this.order) {
      const node = this.nodes[index];
      yield {
        identifier: node.identifier,
        title: node.title,
        depth: node.depth,
        bodyText: node.bodyText,
        nestingLevel: nestingLevelOf(node.identifier),
        childCount: node.children.length,
      };
    }
  }

  /**
   * 指定ノード以下の識別子（自身を含む、前順）
   * @throws NodeNotFoundError
   */
  subtreeIds(identifier: string): string[] {
    return this.subtree(this.resolve(identifier)).map((index) => this.nodes[index].identifier);
  }

  /**
   * JSON投影（`JSON.stringify(index)` でも使われる）
   */
  toJSON(): DocumentIndexJson {
    const toNode = (index: number): SectionNodeJson => {
      const node = this.nodes[index];
      return {
        identifier: node.identifier,
        title: node.title,
        depth: node.depth,
        bodyText: node.bodyText,
        children: node.children.map(toNode),
      };
    };

    const json: DocumentIndexJson = {
      documentId: this.documentId,
      nodes: this.roots.map(toNode),
    };
    const title = this.title();
    if (title !== undefined) {
      json.title = title;
    }
    return json;
  }

  private resolve(identifier: string): number {
    const index = this.lookup.get(identifier);
    if (index === undefined) {
      throw new NodeNotFoundError(identifier);
    }
    return index;
  }

  /**
   * 識別子を分割し、各プレフィックスを対応表で引いてタイトルを並べる
   */
  private breadcrumb(identifier: string): string[] {
    const segments = identifier.split('.');
    const titles: string[] = [];

    for (let i = 1; i <= segments.length; i++) {
      const index = this.lookup.get(segments.slice(0, i).join('.'));
      if (index !== undefined) {
        titles.push(this.nodes[index].title);
      }
    }

    return titles;
  }

  private subtree(rootIndex: number): number[] {
    const result: number[] = [];
    const stack = [rootIndex];

    for (let index = stack.pop(); index !== undefined; index = stack.pop()) {
      result.push(index);
      const children = this.nodes[index].children;
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }

    return result;
  }
}
