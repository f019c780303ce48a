import { describe, it, expect } from 'vitest';
import { classifyLines, parseHeading, splitLines } from '../line-classifier.js';

const DEFAULT_OPTIONS = { skipFencedCode: true, maxHeadingLevel: 6 };

function kinds(text: string, options = DEFAULT_OPTIONS): string[] {
  return [...classifyLines(text, options)].map((line) =>
    line.kind === 'heading' ? `h${line.level}:${line.title}` : 'content'
  );
}

describe('parseHeading', () => {
  describe('見出しとして認識する', () => {
    it('レベルとタイトルを取り出せる', () => {
      expect(parseHeading('# Title')).toEqual({ level: 1, title: 'Title' });
      expect(parseHeading('###### Six')).toEqual({ level: 6, title: 'Six' });
    });

    it('タイトル前後の空白を除去する', () => {
      expect(parseHeading('###   Spaced   ')).toEqual({ level: 3, title: 'Spaced' });
      expect(parseHeading('##\tTabbed')).toEqual({ level: 2, title: 'Tabbed' });
    });

    it('閉じの#列を除去する', () => {
      expect(parseHeading('## Closing ##')).toEqual({ level: 2, title: 'Closing' });
    });

    it('タイトル末尾に接した#は残す', () => {
      expect(parseHeading('# C#')).toEqual({ level: 1, title: 'C#' });
    });

    it('3スペースまでのインデントを許容する', () => {
      expect(parseHeading('   # Indented')).toEqual({ level: 1, title: 'Indented' });
    });
  });

  describe('本文として扱う', () => {
    it('#の直後に空白がない行', () => {
      expect(parseHeading('#tag')).toBeNull();
    });

    it('7個以上の#', () => {
      expect(parseHeading('####### Seven')).toBeNull();
    });

    it('タイトルが空の行', () => {
      expect(parseHeading('#')).toBeNull();
      expect(parseHeading('##   ')).toBeNull();
      expect(parseHeading('## ##')).toBeNull();
    });

    it('4スペース以上のインデント', () => {
      expect(parseHeading('    # code')).toBeNull();
    });

    it('maxHeadingLevelを超えるレベル', () => {
      expect(parseHeading('#### Four', 3)).toBeNull();
      expect(parseHeading('### Three', 3)).toEqual({ level: 3, title: 'Three' });
    });
  });
});

describe('splitLines', () => {
  it('LF・CRLF・CRのいずれでも分割する', () => {
    expect(splitLines('a\nb\r\nc\rd')).toEqual(['a', 'b', 'c', 'd']);
  });
});

describe('classifyLines', () => {
  it('見出し行と本文行を分類する', () => {
    expect(kinds('# A\ntext\n## B')).toEqual(['h1:A', 'content', 'h2:B']);
  });

  it('フェンスドコードブロック内の#行は本文', () => {
    const md = '# A\n```sh\n# comment\n```\n## B';
    expect(kinds(md)).toEqual(['h1:A', 'content', 'content', 'content', 'h2:B']);
  });

  it('skipFencedCodeが無効ならフェンス内も見出しになる', () => {
    const md = '# A\n```sh\n# comment\n```';
    expect(kinds(md, { skipFencedCode: false, maxHeadingLevel: 6 })).toEqual([
      'h1:A',
      'content',
      'h1:comment',
      'content',
    ]);
  });

  it('異なる文字のフェンスでは閉じない', () => {
    const md = '```\n~~~\n# x\n```\n# y';
    expect(kinds(md)).toEqual(['content', 'content', 'content', 'content', 'h1:y']);
  });

  it('開始より短いフェンスでは閉じない', () => {
    const md = '````\n```\n# x\n````\n# y';
    expect(kinds(md)).toEqual(['content', 'content', 'content', 'content', 'h1:y']);
  });

  it('閉じられないフェンスは文書末尾まで続く', () => {
    expect(kinds('```\n# x\n# y')).toEqual(['content', 'content', 'content']);
  });

  it('info stringにバッククォートを含む行はフェンスではない', () => {
    expect(kinds('``` a`b\n# x')).toEqual(['content', 'h1:x']);
  });

  it('HTMLブロック内の#行は本文', () => {
    const md = '# A\n<!--\n# hidden\n-->\n## B';
    expect(kinds(md)).toEqual(['h1:A', 'content', 'content', 'content', 'h2:B']);
  });

  it('下線形式の見出しは本文', () => {
    expect(kinds('# A\nSub\n---\n## B')).toEqual(['h1:A', 'content', 'content', 'h2:B']);
  });

  it('引用やリストの中の#行は本文', () => {
    expect(kinds('# A\n> # quoted\n\n- # item')).toEqual(['h1:A', 'content', 'content', 'content']);
  });

  it('maxHeadingLevelを超える見出しトークンは本文', () => {
    expect(kinds('# A\n### C', { skipFencedCode: true, maxHeadingLevel: 2 })).toEqual([
      'h1:A',
      'content',
    ]);
  });

  it('本文行のテキストはそのまま保持する', () => {
    const lines = [...classifyLines('# A\n  indented  ', DEFAULT_OPTIONS)];
    expect(lines[1]).toEqual({ kind: 'content', text: '  indented  ' });
  });
});
