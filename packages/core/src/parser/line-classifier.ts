/**
 * 行の分類（見出し行 / 本文行）
 *
 * 見出しの判定は marked のブロックトークンに任せる。
 * HTMLブロックやフェンスドコードの中の `#` 行は見出しにならない。
 */

import { marked, type Token, type Tokens } from 'marked';

/**
 * 分類済みの行
 */
export type ClassifiedLine =
  | { kind: 'heading'; level: number; title: string }
  | { kind: 'content'; text: string };

export interface LineClassifierOptions {
  /** フェンスドコードブロック内を本文として扱う */
  skipFencedCode: boolean;
  /** 見出しとして認識する最大レベル */
  maxHeadingLevel: number;
}

interface HeadingLine {
  level: number;
  title: string;
}

/**
 * テキストを行に分割（marked と同じく CRLF/CR/LF を改行とみなす）
 */
export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}

/**
 * 1行を見出しとして解釈する
 * @returns 見出しでなければ null
 */
export function parseHeading(line: string, maxHeadingLevel: number = 6): HeadingLine | null {
  const [token] = marked.lexer(line);
  return token ? toHeading(token, maxHeadingLevel) : null;
}

/**
 * テキストを行ごとに分類する
 * 本文行は元のテキストの行をそのまま返す
 */
export function* classifyLines(
  text: string,
  options: LineClassifierOptions
): Generator<ClassifiedLine> {
  const lines = splitLines(text);
  const headings = locateHeadings(lines, marked.lexer(text), options);

  for (const [lineIndex, line] of lines.entries()) {
    const heading = headings.get(lineIndex);
    if (heading) {
      yield { kind: 'heading', level: heading.level, title: heading.title };
    } else {
      yield { kind: 'content', text: line };
    }
  }
}

/**
 * トップレベルのトークンを順に辿り、見出しになる行番号を求める
 */
function locateHeadings(
  lines: string[],
  tokens: Token[],
  options: LineClassifierOptions
): Map<number, HeadingLine> {
  const headings = new Map<number, HeadingLine>();
  // 次のトークンが始まる行（リンク定義のようにトークン化されない行があると実際より手前になる）
  let cursor = 0;

  for (const token of tokens) {
    const heading = toHeading(token, options.maxHeadingLevel);
    const scanCode = !options.skipFencedCode && isFencedCode(token);

    if (heading || scanCode) {
      const start = lines.indexOf(token.raw.split('\n')[0], cursor);
      if (start !== -1) {
        if (heading) {
          headings.set(start, heading);
        } else {
          const end = Math.min(start + lineCount(token.raw), lines.length);
          for (let lineIndex = start; lineIndex < end; lineIndex++) {
            const inner = parseHeading(lines[lineIndex], options.maxHeadingLevel);
            if (inner) {
              headings.set(lineIndex, inner);
            }
          }
        }
        cursor = start + newlineCount(token.raw);
        continue;
      }
    }

    cursor += newlineCount(token.raw);
  }

  return headings;
}

/**
 * ATX形式（`#` 始まり）の見出しトークンだけを見出しとして扱う
 * setext形式（下線）、上限を超えるレベル、空のタイトルは本文
 */
function toHeading(token: Token, maxHeadingLevel: number): HeadingLine | null {
  if (token.type !== 'heading') {
    return null;
  }

  const headingToken = token as Tokens.Heading;
  const isAtx =
    lineCount(headingToken.raw) === 1 && headingToken.raw.trimStart().startsWith('#');

  if (!isAtx || headingToken.depth > maxHeadingLevel || headingToken.text === '') {
    return null;
  }

  return { level: headingToken.depth, title: headingToken.text };
}

function isFencedCode(token: Token): boolean {
  return token.type === 'code' && (token as Tokens.Code).codeBlockStyle !== 'indented';
}

function newlineCount(raw: string): number {
  return raw.split('\n').length - 1;
}

/**
 * 末尾の改行を除いた行数
 */
function lineCount(raw: string): number {
  return raw.replace(/\n+$/, '').split('\n').length;
}
