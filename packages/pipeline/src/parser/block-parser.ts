import type {
  Block,
  CodeBlock,
  Document,
  DrawerBlock,
  DrawerProperty,
  Footnote,
  HeadingBlock,
  InlineSpan,
  KeywordLine,
  ListBlock,
  MetadataWarning,
  NowebMode,
  ParagraphBlock,
  QuoteBlock,
} from '@orgpress/types';
import { DuplicateFootnoteError } from '../errors.js';
import { extractMetadata } from '../metadata/metadata-extractor.js';
import {
  scanBlocks,
  type RawDrawer,
  type RawExample,
  type RawList,
  type RawQuote,
  type RawSrc,
} from '../scanner/block-scanner.js';
import { parseInline, type InlineContext } from './inline-parser.js';

export interface ParsedDocument {
  document: Document;
  /** メタデータの非致命的な問題（行順） */
  warnings: MetadataWarning[];
}

/** 直後のコードブロックに付く `#+name:` / `#+caption:` 等 */
const AFFILIATED_KEYS = new Set(['name', 'caption', 'header', 'results', 'plot']);
const HEADING_TAGS_RE = /[ \t]+:([\w@#%:]+):[ \t]*$/;
const NOWEB_REF_RE = /<<([^<>\s]+)>>/g;
const DRAWER_PROPERTY_RE = /^[ \t]*:([^:\s]+):[ \t]*(.*)$/;

/**
 * 開いている見出し（子を受け付けている間は可変）
 */
interface OpenHeading {
  depth: number;
  title: InlineSpan[];
  tags: string[];
  footnotes: Footnote[];
  startLine: number;
  children: Block[];
}

interface Affiliated {
  name: string | null;
  caption: string | null;
  /** `#+header:` の値（出現順） */
  headers: string[];
}

const NO_AFFILIATED: Affiliated = { name: null, caption: null, headers: [] };

/**
 * 1文書分の解析状態。parseDocument の呼び出しごとに生成し、共有しない
 */
class DocumentParser {
  private readonly root: Block[] = [];
  /** 深さごとに開いている祖先見出しのスタック */
  private readonly stack: OpenHeading[] = [];
  private readonly keywords: KeywordLine[] = [];
  private readonly footnotes: Footnote[] = [];
  private readonly footnoteIds = new Set<string>();
  private readonly warnings: MetadataWarning[] = [];
  private affiliated: Affiliated = NO_AFFILIATED;
  private inPreamble = true;
  private anonymousCount = 0;

  constructor(private readonly text: string) {}

  parse(): ParsedDocument {
    for (const raw of scanBlocks(this.text)) {
      if (raw.kind === 'comment') {
        continue;
      }

      if (raw.kind === 'keyword') {
        this.handleKeyword(raw.key, raw.value, raw.startLine);
        continue;
      }

      this.inPreamble = false;
      const affiliated = this.affiliated;
      this.affiliated = NO_AFFILIATED;

      switch (raw.kind) {
        case 'heading':
          this.openHeading(raw.depth, raw.text, raw.startLine);
          break;
        case 'paragraph':
          this.append(this.paragraph(raw.lines.join('\n'), raw.startLine, raw.endLine));
          break;
        case 'src':
          this.append(this.srcBlock(raw, affiliated));
          break;
        case 'example':
          this.append(this.exampleBlock(raw, affiliated));
          break;
        case 'quote':
          this.append(this.quoteBlock(raw));
          break;
        case 'drawer':
          this.append(this.drawerBlock(raw));
          break;
        case 'list':
          this.append(this.listBlock(raw));
          break;
        case 'footnote':
          this.footnoteDefinition(raw.label, raw.text, raw.startLine);
          break;
      }
    }

    while (this.stack.length > 0) {
      this.closeHeading();
    }

    const metadata = extractMetadata(this.keywords, this.root);
    const warnings = [...this.warnings, ...metadata.warnings].sort((a, b) => a.line - b.line);

    return {
      document: {
        metadata: metadata.metadata,
        blocks: this.root,
        footnotes: this.footnotes,
      },
      warnings,
    };
  }

  // -------------------------------------------------------------------------
  // キーワード
  // -------------------------------------------------------------------------

  private handleKeyword(key: string, value: string | null, line: number): void {
    if (value === null) {
      this.warnings.push({ message: `Malformed keyword line #+${key} (missing colon)`, line });
      return;
    }

    if (AFFILIATED_KEYS.has(key) || key.startsWith('attr_')) {
      if (key === 'name') {
        this.affiliated = { ...this.affiliated, name: value };
      } else if (key === 'caption') {
        this.affiliated = { ...this.affiliated, caption: value };
      } else if (key === 'header') {
        this.affiliated = { ...this.affiliated, headers: [...this.affiliated.headers, value] };
      }
      return;
    }

    if (!this.inPreamble) {
      this.warnings.push({ message: `Metadata keyword #+${key} after content ignored`, line });
      return;
    }

    this.keywords.push({ key, value, line });
  }

  // -------------------------------------------------------------------------
  // 見出しの入れ子
  // -------------------------------------------------------------------------

  /**
   * depth N の見出しは、depth < N の直近の開いた見出しの子になる（なければルート）
   */
  private openHeading(depth: number, text: string, line: number): void {
    while (this.stack.length > 0 && this.currentHeading().depth >= depth) {
      this.closeHeading();
    }

    let titleText = text;
    let tags: string[] = [];
    const tagMatch = HEADING_TAGS_RE.exec(text);
    if (tagMatch) {
      titleText = text.slice(0, tagMatch.index);
      tags = tagMatch[1].split(':').filter((tag) => tag.length > 0);
    }

    const inline = parseInline(titleText.trim(), this.inlineContext(line));
    this.registerFootnotes(inline.footnotes);

    this.stack.push({
      depth,
      title: inline.spans,
      tags,
      footnotes: inline.footnotes,
      startLine: line,
      children: [],
    });
  }

  private currentHeading(): OpenHeading {
    return this.stack[this.stack.length - 1];
  }

  private closeHeading(): void {
    const open = this.stack.pop();
    if (!open) {
      return;
    }

    const last = open.children.at(-1);
    const heading: HeadingBlock = {
      type: 'heading',
      depth: open.depth,
      title: open.title,
      tags: open.tags,
      children: open.children,
      footnotes: open.footnotes,
      startLine: open.startLine,
      endLine: last ? last.endLine : open.startLine,
    };
    this.append(heading);
  }

  /**
   * 最も深い開いた見出し（なければルート）にブロックを追加
   */
  private append(block: Block): void {
    if (this.stack.length > 0) {
      this.currentHeading().children.push(block);
    } else {
      this.root.push(block);
    }
  }

  // -------------------------------------------------------------------------
  // ブロック
  // -------------------------------------------------------------------------

  private paragraph(text: string, startLine: number, endLine: number): ParagraphBlock {
    const inline = parseInline(text, this.inlineContext(startLine));
    this.registerFootnotes(inline.footnotes);
    return {
      type: 'paragraph',
      content: inline.spans,
      footnotes: inline.footnotes,
      startLine,
      endLine,
    };
  }

  private srcBlock(raw: RawSrc, affiliated: Affiliated): CodeBlock {
    const { language, headerArgs } = parseSrcParameters(raw.parameters, affiliated.headers);
    const noweb = nowebMode(headerArgs.get('noweb'));
    const text = raw.body.join('\n');

    return {
      type: 'code',
      kind: 'src',
      language,
      text,
      name: affiliated.name ?? headerArgs.get('noweb-ref') ?? null,
      references: noweb === 'off' ? [] : findReferences(text),
      noweb,
      headerArgs: Object.fromEntries(headerArgs),
      caption: affiliated.caption,
      startLine: raw.startLine,
      endLine: raw.endLine,
    };
  }

  private exampleBlock(raw: RawExample, affiliated: Affiliated): CodeBlock {
    return {
      type: 'code',
      kind: 'example',
      language: null,
      text: raw.body.join('\n'),
      name: affiliated.name,
      references: [],
      noweb: 'off',
      headerArgs: {},
      caption: affiliated.caption,
      startLine: raw.startLine,
      endLine: raw.endLine,
    };
  }

  private quoteBlock(raw: RawQuote): QuoteBlock {
    const paragraphs: ParagraphBlock[] = [];
    let buffer: string[] = [];
    let bufferStart = 0;

    const flush = (endLine: number): void => {
      if (buffer.length > 0) {
        paragraphs.push(this.paragraph(buffer.join('\n'), bufferStart, endLine));
        buffer = [];
      }
    };

    raw.body.forEach((line, index) => {
      // 本文は開始デリミタの次の行から
      const lineNo = raw.startLine + 1 + index;
      if (line.trim().length === 0) {
        flush(lineNo - 1);
        return;
      }
      if (buffer.length === 0) {
        bufferStart = lineNo;
      }
      buffer.push(line.trim());
    });
    flush(raw.endLine - 1);

    return {
      type: 'quote',
      variant: raw.variant,
      paragraphs,
      startLine: raw.startLine,
      endLine: raw.endLine,
    };
  }

  private drawerBlock(raw: RawDrawer): DrawerBlock {
    const properties: DrawerProperty[] = [];
    const lines: string[] = [];

    for (const line of raw.body) {
      const property = DRAWER_PROPERTY_RE.exec(line);
      if (property) {
        properties.push({ key: property[1], value: property[2].trim() });
      } else if (line.trim().length > 0) {
        lines.push(line.trim());
      }
    }

    return {
      type: 'drawer',
      name: raw.name,
      properties,
      lines,
      startLine: raw.startLine,
      endLine: raw.endLine,
    };
  }

  private listBlock(raw: RawList): ListBlock {
    return {
      type: 'list',
      ordered: raw.ordered,
      items: raw.items.map((item) => {
        const inline = parseInline(item.text, this.inlineContext(item.line));
        this.registerFootnotes(inline.footnotes);
        return { content: inline.spans, footnotes: inline.footnotes, line: item.line };
      }),
      startLine: raw.startLine,
      endLine: raw.endLine,
    };
  }

  // -------------------------------------------------------------------------
  // 脚注
  // -------------------------------------------------------------------------

  private footnoteDefinition(label: string, text: string, line: number): void {
    const inline = parseInline(text, this.inlineContext(line));
    const footnote: Footnote = { id: label, content: inline.spans, inline: false, line };
    this.registerFootnotes([footnote, ...inline.footnotes]);
    this.footnotes.push(footnote, ...inline.footnotes);
  }

  private registerFootnotes(footnotes: readonly Footnote[]): void {
    for (const footnote of footnotes) {
      if (this.footnoteIds.has(footnote.id)) {
        throw new DuplicateFootnoteError(footnote.id, footnote.line);
      }
      this.footnoteIds.add(footnote.id);
    }
  }

  private inlineContext(line: number): InlineContext {
    return {
      line,
      nextAnonymousId: () => `anon.${++this.anonymousCount}`,
    };
  }
}

/**
 * `swift :noweb yes :noweb-ref name` を言語とヘッダ引数に分解
 *
 * `#+header:` 行の引数を先に読み、同じキーは開始行の引数で上書きする。
 */
function parseSrcParameters(
  parameters: string,
  headers: readonly string[]
): {
  language: string | null;
  headerArgs: Map<string, string>;
} {
  const headerArgs = new Map<string, string>();
  for (const header of headers) {
    readHeaderArgs(tokenize(header), headerArgs);
  }

  const tokens = tokenize(parameters);
  let language: string | null = null;
  if (tokens.length > 0 && !tokens[0].startsWith(':')) {
    language = tokens[0];
    tokens.shift();
  }
  readHeaderArgs(tokens, headerArgs);

  return { language, headerArgs };
}

function tokenize(parameters: string): string[] {
  return parameters.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * `:key value...` の並びを into に書き込む（最初のキーより前の語は無視）
 */
function readHeaderArgs(tokens: readonly string[], into: Map<string, string>): void {
  let currentKey: string | null = null;
  let values: string[] = [];

  const flush = (): void => {
    if (currentKey !== null) {
      into.set(currentKey, values.join(' '));
    }
  };

  for (const token of tokens) {
    if (token.startsWith(':')) {
      flush();
      currentKey = token.slice(1).toLowerCase();
      values = [];
    } else if (currentKey !== null) {
      values.push(token);
    }
  }
  flush();
}

function nowebMode(value: string | undefined): NowebMode {
  switch (value?.toLowerCase()) {
    case 'yes':
      return 'expand';
    case 'strip-export':
      return 'strip';
    default:
      return 'off';
  }
}

/**
 * 本文中の `<<name>>` を出現順・重複なしで返す
 */
function findReferences(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(NOWEB_REF_RE)) {
    if (!names.includes(match[1])) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * テキストを解析して Document を構築する
 *
 * 構造エラー（閉じられていないブロック、重複した脚注定義）は例外として投げる。
 */
export function parseDocument(text: string): ParsedDocument {
  return new DocumentParser(text).parse();
}
