/**
 * エラーメッセージの整形
 */

import { DocnavError, DocumentReadError, NodeNotFoundError } from '@docnav/core';

/**
 * エラーを利用者向けのメッセージに変換
 */
export function formatError(error: unknown): string {
  if (error instanceof NodeNotFoundError) {
    return `エラー: セクション "${error.identifier}" が見つかりません。docnav outline で識別子を確認してください。`;
  }
  if (error instanceof DocumentReadError) {
    return `エラー: 文書を読み込めません: ${error.path}`;
  }
  if (error instanceof DocnavError) {
    return `エラー [${error.code}]: ${error.message}`;
  }
  if (error instanceof Error) {
    return `エラー: ${error.message}`;
  }
  return 'エラー: 不明なエラーが発生しました。';
}

/**
 * コマンドを実行し、結果を標準出力へ、エラーを標準エラーへ出力
 * エラー時は終了コード1で終了
 */
export async function runAndPrint(run: () => Promise<string>): Promise<void> {
  try {
    const output = await run();
    console.log(output);
  } catch (error) {
    console.error(formatError(error));
    process.exit(1);
  }
}
