import { encode } from 'gpt-tokenizer';

/**
 * トークン数をカウントするクラス
 */
export class TokenCounter {
  /**
   * テキストのトークン数を計測
   * @param text 計測するテキスト
   * @returns トークン数
   */
  count(text: string): number {
    if (text === '') {
      return 0;
    }

    try {
      return encode(text).length;
    } catch (_error) {
      // エラー時は文字数の1/4を概算値として使用
      console.warn('Token counting failed, using character count / 4 as fallback');
      return Math.ceil(text.length / 4);
    }
  }
}
