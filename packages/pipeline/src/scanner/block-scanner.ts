import { MalformedBlockError } from '../errors.js';

interface RawBlockBase {
  /** 開始行（1-indexed） */
  startLine: number;
  /** 終了行（1-indexed、終了デリミタを含む） */
  endLine: number;
}

export interface RawHeading extends RawBlockBase {
  kind: 'heading';
  depth: number;
  text: string;
}

export interface RawKeyword extends RawBlockBase {
  kind: 'keyword';
  /** 小文字化したキー */
  key: string;
  /** コロンがない場合は null */
  value: string | null;
}

export interface RawSrc extends RawBlockBase {
  kind: 'src';
  /** `#+begin_src` に続く文字列（言語とヘッダ引数） */
  parameters: string;
  body: string[];
}

export interface RawExample extends RawBlockBase {
  kind: 'example';
  body: string[];
}

export interface RawQuote extends RawBlockBase {
  kind: 'quote';
  variant: string;
  body: string[];
}

export interface RawDrawer extends RawBlockBase {
  kind: 'drawer';
  name: string;
  body: string[];
}

export interface RawFootnote extends RawBlockBase {
  kind: 'footnote';
  label: string;
  text: string;
}

export interface RawListItem {
  line: number;
  text: string;
}

export interface RawList extends RawBlockBase {
  kind: 'list';
  ordered: boolean;
  items: RawListItem[];
}

export interface RawParagraph extends RawBlockBase {
  kind: 'paragraph';
  lines: string[];
}

export interface RawComment extends RawBlockBase {
  kind: 'comment';
}

export type RawBlock =
  | RawHeading
  | RawKeyword
  | RawSrc
  | RawExample
  | RawQuote
  | RawDrawer
  | RawFootnote
  | RawList
  | RawParagraph
  | RawComment;

export type RawBlockKind = RawBlock['kind'];

const HEADING_RE = /^(\*+)(?:[ \t]+(.*))?$/;
const BEGIN_RE = /^([ \t]*)#\+begin_(\S+)(?:[ \t]+(.*))?$/i;
const END_RE = /^[ \t]*#\+end_(\S+)[ \t]*$/i;
const KEYWORD_RE = /^[ \t]*#\+([^\s:]+):[ \t]*(.*)$/;
const BARE_KEYWORD_RE = /^[ \t]*#\+(\S+)/;
const COMMENT_RE = /^[ \t]*#(?:[ \t].*)?$/;
const DRAWER_START_RE = /^[ \t]*:([\w-]+):[ \t]*$/;
const DRAWER_END_RE = /^[ \t]*:END:[ \t]*$/i;
const FOOTNOTE_DEF_RE = /^\[fn:([\w-]+)\][ \t]*(.*)$/;
const LIST_ITEM_RE = /^([ \t]*)([-+]|\d+[.)])[ \t]+(.*)$/;
const BLANK_RE = /^[ \t]*$/;
/** src/example ブロック内のエスケープ（`,*` / `,#+`） */
const ESCAPED_LINE_RE = /^([ \t]*),(\*|#\+)/;

function isBlank(line: string): boolean {
  return BLANK_RE.test(line);
}

function indentOf(line: string): number {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0].length : 0;
}

/**
 * 段落や脚注定義を中断する行か
 */
function startsNewBlock(line: string): boolean {
  return (
    HEADING_RE.test(line) ||
    /^[ \t]*#\+/.test(line) ||
    COMMENT_RE.test(line) ||
    FOOTNOTE_DEF_RE.test(line) ||
    LIST_ITEM_RE.test(line)
  );
}

/**
 * テキストをブロック境界の列に分割する
 *
 * 1パスの遅延ジェネレータ。再実行するには同じ入力で再度呼び出す。
 * `#+begin_…` ブロックやドロワーが閉じられずに入力が終わった場合は
 * MalformedBlockError を投げる。
 */
export function* scanBlocks(text: string): Generator<RawBlock, void, undefined> {
  const lines = text.split(/\r?\n/);
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];

    if (isBlank(line)) {
      i++;
      continue;
    }

    const heading = HEADING_RE.exec(line);
    if (heading) {
      yield {
        kind: 'heading',
        depth: heading[1].length,
        text: (heading[2] ?? '').trim(),
        startLine: i + 1,
        endLine: i + 1,
      };
      i++;
      continue;
    }

    const begin = BEGIN_RE.exec(line);
    if (begin) {
      const [block, next] = scanDelimited(lines, i, begin[1].length, begin[2], begin[3] ?? '');
      yield block;
      i = next;
      continue;
    }

    const keyword = KEYWORD_RE.exec(line);
    if (keyword) {
      yield {
        kind: 'keyword',
        key: keyword[1].toLowerCase(),
        value: keyword[2].trim(),
        startLine: i + 1,
        endLine: i + 1,
      };
      i++;
      continue;
    }

    const bareKeyword = BARE_KEYWORD_RE.exec(line);
    if (bareKeyword && !END_RE.test(line)) {
      yield {
        kind: 'keyword',
        key: bareKeyword[1].toLowerCase(),
        value: null,
        startLine: i + 1,
        endLine: i + 1,
      };
      i++;
      continue;
    }

    if (COMMENT_RE.test(line) || END_RE.test(line)) {
      // 対応する begin のない end 行はコメントと同様に読み飛ばす
      yield { kind: 'comment', startLine: i + 1, endLine: i + 1 };
      i++;
      continue;
    }

    const drawer = DRAWER_START_RE.exec(line);
    if (drawer && drawer[1].toUpperCase() !== 'END') {
      const [block, next] = scanDrawer(lines, i, drawer[1]);
      yield block;
      i = next;
      continue;
    }

    const footnote = FOOTNOTE_DEF_RE.exec(line);
    if (footnote) {
      const [block, next] = scanFootnote(lines, i, footnote[1], footnote[2]);
      yield block;
      i = next;
      continue;
    }

    const item = LIST_ITEM_RE.exec(line);
    if (item) {
      const [block, next] = scanList(lines, i);
      yield block;
      i = next;
      continue;
    }

    const [block, next] = scanParagraph(lines, i);
    yield block;
    i = next;
  }
}

/**
 * `#+begin_NAME` … `#+end_NAME` を読む
 */
function scanDelimited(
  lines: string[],
  start: number,
  indent: number,
  name: string,
  parameters: string
): [RawSrc | RawExample | RawQuote, number] {
  const lowerName = name.toLowerCase();
  const body: string[] = [];

  for (let j = start + 1; j < lines.length; j++) {
    const end = END_RE.exec(lines[j]);
    if (end && end[1].toLowerCase() === lowerName) {
      const startLine = start + 1;
      const endLine = j + 1;
      if (lowerName === 'src') {
        return [{ kind: 'src', parameters: parameters.trim(), body, startLine, endLine }, j + 1];
      }
      if (lowerName === 'example') {
        return [{ kind: 'example', body, startLine, endLine }, j + 1];
      }
      return [{ kind: 'quote', variant: lowerName, body, startLine, endLine }, j + 1];
    }

    body.push(lowerName === 'src' || lowerName === 'example'
      ? unescapeCodeLine(stripIndent(lines[j], indent))
      : lines[j]);
  }

  throw new MalformedBlockError(lowerName, start + 1);
}

function stripIndent(line: string, indent: number): string {
  const width = Math.min(indent, indentOf(line));
  return line.slice(width);
}

function unescapeCodeLine(line: string): string {
  return line.replace(ESCAPED_LINE_RE, '$1$2');
}

/**
 * `:NAME:` … `:END:` を読む
 */
function scanDrawer(lines: string[], start: number, name: string): [RawDrawer, number] {
  const body: string[] = [];

  for (let j = start + 1; j < lines.length; j++) {
    if (DRAWER_END_RE.test(lines[j])) {
      return [{ kind: 'drawer', name, body, startLine: start + 1, endLine: j + 1 }, j + 1];
    }
    body.push(lines[j]);
  }

  throw new MalformedBlockError('drawer', start + 1);
}

/**
 * `[fn:label] text` を空行・見出し・次の定義まで読む
 */
function scanFootnote(
  lines: string[],
  start: number,
  label: string,
  firstLine: string
): [RawFootnote, number] {
  const parts = [firstLine.trim()];
  let j = start + 1;

  while (j < lines.length && !isBlank(lines[j]) && !startsNewBlock(lines[j])) {
    parts.push(lines[j].trim());
    j++;
  }

  return [
    {
      kind: 'footnote',
      label,
      text: parts.filter((part) => part.length > 0).join(' '),
      startLine: start + 1,
      endLine: j,
    },
    j,
  ];
}

/**
 * 連続するリスト項目を読む
 *
 * 入れ子のリストは平坦化する（より深い項目も同じリストの項目になる）。
 * 項目間の空行1つはリストを終わらせない。
 */
function scanList(lines: string[], start: number): [RawList, number] {
  const first = LIST_ITEM_RE.exec(lines[start]);
  const baseIndent = first ? first[1].length : 0;
  const ordered = first ? /\d/.test(first[2]) : false;
  const items: Array<{ line: number; parts: string[] }> = [];
  let j = start;
  let endLine = start + 1;

  while (j < lines.length) {
    const line = lines[j];
    const item = LIST_ITEM_RE.exec(line);

    if (item && item[1].length >= baseIndent) {
      items.push({ line: j + 1, parts: [item[3].trim()] });
      endLine = j + 1;
      j++;
      continue;
    }

    if (isBlank(line)) {
      // 空行の次が同じリストの項目なら継続
      const following = j + 1 < lines.length ? LIST_ITEM_RE.exec(lines[j + 1]) : null;
      if (following && following[1].length >= baseIndent) {
        j++;
        continue;
      }
      break;
    }

    const current = items.at(-1);
    if (current && indentOf(line) > baseIndent && !startsNewBlock(line)) {
      current.parts.push(line.trim());
      endLine = j + 1;
      j++;
      continue;
    }

    break;
  }

  return [
    {
      kind: 'list',
      ordered,
      items: items.map((item) => ({ line: item.line, text: item.parts.join(' ') })),
      startLine: start + 1,
      endLine,
    },
    endLine,
  ];
}

/**
 * 空行または別ブロックの開始まで段落として読む
 */
function scanParagraph(lines: string[], start: number): [RawParagraph, number] {
  const body = [lines[start].trim()];
  let j = start + 1;

  while (j < lines.length && !isBlank(lines[j]) && !startsNewBlock(lines[j])) {
    body.push(lines[j].trim());
    j++;
  }

  return [{ kind: 'paragraph', lines: body, startLine: start + 1, endLine: j }, j];
}
