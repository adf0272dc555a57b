import { describe, it, expect } from 'vitest';
import type { KeywordLine } from '@orgpress/types';
import { extractMetadata } from '../metadata-extractor.js';
import { parseDocument } from '../../parser/block-parser.js';

function keywords(...entries: Array<[string, string]>): KeywordLine[] {
  return entries.map(([key, value], index) => ({ key, value, line: index + 1 }));
}

describe('extractMetadata', () => {
  it('#+tags だけの文書は summary が空文字列になる', () => {
    const { metadata, warnings } = extractMetadata(keywords(['tags', 'swift']), []);

    expect(metadata).toEqual({
      title: '',
      tags: ['swift'],
      keywords: [],
      summary: '',
      date: '',
      author: '',
      changelog: [],
      properties: {},
    });
    expect(warnings).toEqual([]);
  });

  it('タグとキーワードを重複なし・宣言順で集める', () => {
    const { metadata } = extractMetadata(
      keywords(['tags', 'a b, a'], ['filetags', ':b:c:'], ['keywords', 'swift, optionals ,swift']),
      []
    );

    expect(metadata.tags).toEqual(['a', 'b', 'c']);
    expect(metadata.keywords).toEqual(['swift', 'optionals']);
  });

  it('単一値のキーワードは最初の値を採用し、重複を警告する', () => {
    const { metadata, warnings } = extractMetadata(
      keywords(['title', 'First'], ['title', 'Second'], ['description', 'About things']),
      []
    );

    expect(metadata.title).toBe('First');
    expect(metadata.summary).toBe('About things');
    expect(warnings).toEqual([{ message: 'Duplicate #+title ignored', line: 2 }]);
  });

  it('空の値を警告する', () => {
    const { metadata, warnings } = extractMetadata(keywords(['author', '  ']), []);

    expect(metadata.author).toBe('');
    expect(warnings).toEqual([{ message: 'Empty value for #+author', line: 1 }]);
  });

  it('その他のキーワードは properties に入り、繰り返しは連結する', () => {
    const { metadata } = extractMetadata(
      keywords(['language', 'en'], ['options', 'toc:nil'], ['options', 'num:nil']),
      []
    );

    expect(metadata.properties).toEqual({ language: 'en', options: 'toc:nil num:nil' });
  });

  describe('Changelog', () => {
    it('Changelog 見出しのリスト項目と段落からエントリを作る', () => {
      const text = [
        '#+title: Doc',
        '* Notes',
        'Text',
        '* Changelog',
        '- *2020-06-19* : Initial version',
        '- *2021-01-02* - Added noweb',
        '- untitled change',
        '',
        '*2022-03-04* Rewrote renderer',
      ].join('\n');
      const { document, warnings } = parseDocument(text);

      expect(document.metadata.changelog).toEqual([
        { date: '2020-06-19', description: 'Initial version' },
        { date: '2021-01-02', description: 'Added noweb' },
        { date: '2022-03-04', description: 'Rewrote renderer' },
      ]);
      expect(warnings).toEqual([{ message: 'Changelog entry without a bold date marker', line: 7 }]);
    });

    it('入れ子の Change Log 見出しも対象になり、最後のものを使う', () => {
      const text = [
        '* Changelog',
        '- *old* : ignored',
        '* Appendix',
        '** Change Log',
        '- *v2* : current',
      ].join('\n');
      const { document } = parseDocument(text);

      expect(document.metadata.changelog).toEqual([{ date: 'v2', description: 'current' }]);
    });

    it('Changelog 見出しがなければ空', () => {
      const { document } = parseDocument('* Notes\n- *2020-01-01* : not a changelog');
      expect(document.metadata.changelog).toEqual([]);
    });
  });
});
