import { describe, it, expect } from 'vitest';
import { parseDocument } from '../block-parser.js';
import { DuplicateFootnoteError, MalformedBlockError } from '../../errors.js';

describe('parseDocument', () => {
  describe('見出しの入れ子', () => {
    it('深い見出しは直近の浅い見出しの子になる', () => {
      const text = ['* A', 'text', '** B', 'body', '* C'].join('\n');
      const { document } = parseDocument(text);

      expect(document.blocks).toMatchObject([
        {
          type: 'heading',
          depth: 1,
          title: [{ type: 'text', value: 'A' }],
          startLine: 1,
          endLine: 4,
          children: [
            { type: 'paragraph', startLine: 2, endLine: 2 },
            {
              type: 'heading',
              depth: 2,
              startLine: 3,
              endLine: 4,
              children: [{ type: 'paragraph', content: [{ type: 'text', value: 'body' }] }],
            },
          ],
        },
        { type: 'heading', depth: 1, startLine: 5, endLine: 5, children: [] },
      ]);
    });

    it('親のない depth 3 の見出しはルートに付く', () => {
      const text = ['Intro', '*** Deep', '* Top'].join('\n');
      const { document } = parseDocument(text);

      expect(document.blocks.map((block) => block.type)).toEqual(['paragraph', 'heading', 'heading']);
      expect(document.blocks[1]).toMatchObject({ depth: 3, children: [] });
      expect(document.blocks[2]).toMatchObject({ depth: 1, children: [] });
    });

    it('見出し末尾のタグを分離する', () => {
      const { document } = parseDocument('* Optionals in /Swift/ :swift:lang:');

      expect(document.blocks[0]).toMatchObject({
        type: 'heading',
        title: [
          { type: 'text', value: 'Optionals in ' },
          { type: 'italic', children: [{ type: 'text', value: 'Swift' }] },
        ],
        tags: ['swift', 'lang'],
      });
    });
  });

  describe('コードブロック', () => {
    it('言語・ヘッダ引数・#+name を読み取る', () => {
      const text = [
        '#+title: T',
        '#+name: greet',
        '#+begin_src python :noweb yes :results output',
        'print(1)',
        '#+end_src',
      ].join('\n');
      const { document } = parseDocument(text);

      expect(document.blocks).toEqual([
        {
          type: 'code',
          kind: 'src',
          language: 'python',
          text: 'print(1)',
          name: 'greet',
          references: [],
          noweb: 'expand',
          headerArgs: { noweb: 'yes', results: 'output' },
          caption: null,
          startLine: 3,
          endLine: 5,
        },
      ]);
      expect(document.metadata.title).toBe('T');
    });

    it(':noweb が有効なブロックの参照を出現順・重複なしで集める', () => {
      const text = [
        '#+begin_src swift :noweb yes',
        '<<setup>>',
        '<<body>> // <<setup>>',
        '#+end_src',
        '#+begin_src swift',
        '<<setup>>',
        '#+end_src',
      ].join('\n');
      const { document } = parseDocument(text);

      expect(document.blocks[0]).toMatchObject({ noweb: 'expand', references: ['setup', 'body'] });
      // :noweb なしでは参照として扱わない
      expect(document.blocks[1]).toMatchObject({ noweb: 'off', references: [] });
    });

    it(':noweb-ref で名前を付け、#+caption を保持する', () => {
      const text = [
        '#+caption: Shared imports',
        '#+begin_src swift :noweb-ref imports',
        'import Foundation',
        '#+end_src',
      ].join('\n');
      const { document } = parseDocument(text);

      expect(document.blocks[0]).toMatchObject({ name: 'imports', caption: 'Shared imports' });
    });

    it('#+header の引数を読み、開始行の引数を優先する', () => {
      const text = [
        '#+header: :noweb yes',
        '#+header: :results silent :exports code',
        '#+begin_src swift :results output',
        '<<setup>>',
        '#+end_src',
      ].join('\n');
      const { document } = parseDocument(text);

      expect(document.blocks[0]).toMatchObject({
        language: 'swift',
        noweb: 'expand',
        references: ['setup'],
        headerArgs: { noweb: 'yes', results: 'output', exports: 'code' },
      });
    });

    it('#+header は直後のブロックだけに付く', () => {
      const text = [
        '#+header: :noweb yes',
        '#+begin_src sh',
        'echo one',
        '#+end_src',
        '#+begin_src sh',
        '<<x>>',
        '#+end_src',
      ].join('\n');
      const { document } = parseDocument(text);

      expect(document.blocks[1]).toMatchObject({ noweb: 'off', references: [] });
    });

    it('example ブロックは言語なし', () => {
      const { document } = parseDocument('#+begin_example\n  raw <<x>>\n#+end_example');

      expect(document.blocks[0]).toMatchObject({
        type: 'code',
        kind: 'example',
        language: null,
        text: '  raw <<x>>',
        references: [],
      });
    });

    it('閉じられていないブロックは MalformedBlockError', () => {
      expect(() => parseDocument('* H\n#+begin_src swift\nlet x = 1')).toThrow(MalformedBlockError);
      expect(() => parseDocument('* H\n#+begin_src swift\nlet x = 1')).toThrow(
        'Unterminated src block (line 2)'
      );
    });
  });

  describe('その他のブロック', () => {
    it('引用ブロックを空行で段落に分ける', () => {
      const text = ['#+begin_quote', 'First', 'line', '', 'Second', '#+end_quote'].join('\n');
      const { document } = parseDocument(text);

      expect(document.blocks[0]).toMatchObject({
        type: 'quote',
        variant: 'quote',
        startLine: 1,
        endLine: 6,
        paragraphs: [
          { content: [{ type: 'text', value: 'First\nline' }], startLine: 2, endLine: 3 },
          { content: [{ type: 'text', value: 'Second' }], startLine: 5, endLine: 5 },
        ],
      });
    });

    it('ドロワーのプロパティを読み取る', () => {
      const text = [':PROPERTIES:', ':ID: 42', ':CUSTOM_ID: intro', 'free text', ':END:'].join('\n');
      const { document } = parseDocument(text);

      expect(document.blocks[0]).toEqual({
        type: 'drawer',
        name: 'PROPERTIES',
        properties: [
          { key: 'ID', value: '42' },
          { key: 'CUSTOM_ID', value: 'intro' },
        ],
        lines: ['free text'],
        startLine: 1,
        endLine: 5,
      });
    });

    it('リスト項目をインライン解析する', () => {
      const { document } = parseDocument('- *one*\n- two');

      expect(document.blocks[0]).toMatchObject({
        type: 'list',
        ordered: false,
        items: [
          { content: [{ type: 'bold', children: [{ type: 'text', value: 'one' }] }], line: 1 },
          { content: [{ type: 'text', value: 'two' }], line: 2 },
        ],
      });
    });
  });

  describe('脚注', () => {
    it('インライン脚注は囲んでいるブロックが所有する', () => {
      const { document } = parseDocument('text[fn:: note]');

      expect(document.blocks).toEqual([
        {
          type: 'paragraph',
          content: [
            { type: 'text', value: 'text' },
            { type: 'footnote-ref', id: 'anon.1' },
          ],
          footnotes: [{ id: 'anon.1', content: [{ type: 'text', value: 'note' }], inline: true, line: 1 }],
          startLine: 1,
          endLine: 1,
        },
      ]);
      expect(document.footnotes).toEqual([]);
    });

    it('匿名脚注のIDは文書内で連番になる', () => {
      const { document } = parseDocument('a[fn:: one]\n\nb[fn:: two]');

      expect(document.blocks).toMatchObject([
        { footnotes: [{ id: 'anon.1' }] },
        { footnotes: [{ id: 'anon.2' }] },
      ]);
    });

    it('本文と別に定義された脚注は文書の脚注になる', () => {
      const { document } = parseDocument('Body[fn:n]\n\n[fn:n] Note text');

      expect(document.footnotes).toEqual([
        { id: 'n', content: [{ type: 'text', value: 'Note text' }], inline: false, line: 3 },
      ]);
    });

    it('同じIDの脚注定義は DuplicateFootnoteError', () => {
      expect(() => parseDocument('[fn:a] one\n[fn:a] two')).toThrow(DuplicateFootnoteError);
      expect(() => parseDocument('[fn:a] one\n[fn:a] two')).toThrow(
        'Duplicate footnote definition [fn:a] (line 2)'
      );
    });
  });

  describe('警告', () => {
    it('本文の後のメタデータキーワードは無視して警告する', () => {
      const { document, warnings } = parseDocument('Body\n#+author: Someone');

      expect(document.metadata.author).toBe('');
      expect(warnings).toEqual([{ message: 'Metadata keyword #+author after content ignored', line: 2 }]);
    });

    it('コロンのないキーワード行を警告する', () => {
      const { warnings } = parseDocument('#+options\n#+title: Ok');

      expect(warnings).toEqual([{ message: 'Malformed keyword line #+options (missing colon)', line: 1 }]);
    });
  });
});
