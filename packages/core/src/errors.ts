/**
 * docnavのエラー定義
 */

export type DocnavErrorCode =
  | 'EMPTY_DOCUMENT'
  | 'NOT_FOUND'
  | 'IO_FAILURE'
  | 'INVALID_ARGUMENT'
  | 'INVALID_PROJECTION';

/**
 * 全エラーの基底クラス
 */
export class DocnavError extends Error {
  constructor(
    message: string,
    public readonly code: DocnavErrorCode
  ) {
    super(message);
    this.name = 'DocnavError';
  }
}

/**
 * 見出しが1つもない文書（parser.requireHeadings 有効時のみ）
 */
export class EmptyDocumentError extends DocnavError {
  constructor(public readonly documentId: string) {
    super(`Document "${documentId}" contains no headings`, 'EMPTY_DOCUMENT');
    this.name = 'EmptyDocumentError';
  }
}

/**
 * 識別子に一致するノードがない
 */
export class NodeNotFoundError extends DocnavError {
  constructor(public readonly identifier: string) {
    super(`Node not found: ${identifier}`, 'NOT_FOUND');
    this.name = 'NodeNotFoundError';
  }
}

/**
 * 文書ファイルの読み込み失敗
 */
export class DocumentReadError extends DocnavError {
  constructor(
    public readonly path: string,
    public readonly originalError?: unknown
  ) {
    super(`Failed to read document ${path}: ${describeError(originalError)}`, 'IO_FAILURE');
    this.name = 'DocumentReadError';
  }
}

export class InvalidArgumentError extends DocnavError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

/**
 * JSON投影が構造の不変条件を満たさない
 */
export class InvalidProjectionError extends DocnavError {
  constructor(message: string) {
    super(message, 'INVALID_PROJECTION');
    this.name = 'InvalidProjectionError';
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
