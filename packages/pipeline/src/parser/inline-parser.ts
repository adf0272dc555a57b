import type { Footnote, InlineSpan } from '@orgpress/types';

/**
 * インライン解析のコンテキスト（1文書ごとに生成）
 */
export interface InlineContext {
  /** 解析対象の行（インライン脚注の定義位置として記録） */
  line: number;
  /** 匿名脚注のIDを採番 */
  nextAnonymousId(): string;
}

export interface InlineResult {
  spans: InlineSpan[];
  /** テキスト中でインライン定義された脚注 */
  footnotes: Footnote[];
}

/** 強調の開始マーカー直前に許される文字 */
const PRE_CHARS = new Set([' ', '\t', '\n', '-', '(', '{', "'", '"']);
/** 強調の終了マーカー直後に許される文字 */
const POST_CHARS = new Set([' ', '\t', '\n', '-', '.', ',', ';', ':', '!', '?', "'", ')', '}', '"', '[', ']', '\\']);

const LINK_RE = /^\[\[([^\]]+)\](?:\[([^\]]*)\])?\]/;
const FOOTNOTE_REF_RE = /^\[fn:([\w-]+)\]/;
const INLINE_FOOTNOTE_RE = /^\[fn:([\w-]*):/;

type EmphasisMarker = '*' | '/' | '~' | '=';

function isEmphasisMarker(char: string): char is EmphasisMarker {
  return char === '*' || char === '/' || char === '~' || char === '=';
}

function isWhitespace(char: string | undefined): boolean {
  return char === ' ' || char === '\t' || char === '\n';
}

/**
 * インラインマークアップを左から右への1回の走査で解析する
 *
 * 閉じられていないマーカーはリテラルとして扱い、エラーにはしない。
 * `~code~` / `=verbatim=` の中身は解析しない。
 */
export function parseInline(text: string, context: InlineContext): InlineResult {
  const footnotes: Footnote[] = [];
  const spans = scan(text, context, footnotes);
  return { spans, footnotes };
}

function scan(text: string, context: InlineContext, footnotes: Footnote[]): InlineSpan[] {
  const spans: InlineSpan[] = [];
  let plain = '';
  let i = 0;

  const flush = (): void => {
    if (plain.length > 0) {
      spans.push({ type: 'text', value: plain });
      plain = '';
    }
  };

  while (i < text.length) {
    const char = text[i];

    if (char === '[') {
      const bracket = scanBracket(text, i, context, footnotes);
      if (bracket) {
        flush();
        spans.push(bracket.span);
        i = bracket.end;
        continue;
      }
    }

    if (isEmphasisMarker(char) && canOpen(text, i)) {
      const close = findCloser(text, i, char);
      if (close !== -1) {
        flush();
        const inner = text.slice(i + 1, close);
        if (char === '~' || char === '=') {
          spans.push({ type: 'code', value: inner });
        } else if (char === '*') {
          spans.push({ type: 'bold', children: scan(inner, context, footnotes) });
        } else {
          spans.push({ type: 'italic', children: scan(inner, context, footnotes) });
        }
        i = close + 1;
        continue;
      }
    }

    plain += char;
    i++;
  }

  flush();
  return spans;
}

/**
 * `[` で始まるリンク・脚注を解析する。該当しなければ null
 */
function scanBracket(
  text: string,
  start: number,
  context: InlineContext,
  footnotes: Footnote[]
): { span: InlineSpan; end: number } | null {
  const rest = text.slice(start);

  const link = LINK_RE.exec(rest);
  if (link) {
    const url = link[1];
    return {
      span: { type: 'link', url, text: link[2] ?? url },
      end: start + link[0].length,
    };
  }

  const ref = FOOTNOTE_REF_RE.exec(rest);
  if (ref) {
    return { span: { type: 'footnote-ref', id: ref[1] }, end: start + ref[0].length };
  }

  const inline = INLINE_FOOTNOTE_RE.exec(rest);
  if (inline) {
    const bodyStart = start + inline[0].length;
    const close = findMatchingBracket(text, bodyStart);
    if (close === -1) {
      return null;
    }

    const id = inline[1].length > 0 ? inline[1] : context.nextAnonymousId();
    const content = scan(text.slice(bodyStart, close).trim(), context, footnotes);
    footnotes.push({ id, content, inline: true, line: context.line });
    return { span: { type: 'footnote-ref', id }, end: close + 1 };
  }

  return null;
}

/**
 * 入れ子の `[...]` を考慮して、対応する `]` の位置を返す
 */
function findMatchingBracket(text: string, from: number): number {
  let depth = 0;
  for (let k = from; k < text.length; k++) {
    if (text[k] === '[') {
      depth++;
    } else if (text[k] === ']') {
      if (depth === 0) {
        return k;
      }
      depth--;
    }
  }
  return -1;
}

function canOpen(text: string, index: number): boolean {
  const before = index === 0 ? undefined : text[index - 1];
  const after = text[index + 1];
  if (after === undefined || isWhitespace(after)) {
    return false;
  }
  return before === undefined || PRE_CHARS.has(before);
}

/**
 * 終了マーカーの位置を返す。見つからなければ -1
 */
function findCloser(text: string, open: number, marker: EmphasisMarker): number {
  for (let k = open + 2; k < text.length; k++) {
    if (text[k] !== marker) {
      continue;
    }
    const before = text[k - 1];
    const after = k + 1 < text.length ? text[k + 1] : undefined;
    if (!isWhitespace(before) && (after === undefined || POST_CHARS.has(after))) {
      return k;
    }
  }
  return -1;
}

/**
 * スパン列をプレーンテキストに変換
 */
export function spansToText(spans: readonly InlineSpan[]): string {
  return spans
    .map((span) => {
      switch (span.type) {
        case 'text':
        case 'code':
          return span.value;
        case 'bold':
        case 'italic':
          return spansToText(span.children);
        case 'link':
          return span.text;
        case 'footnote-ref':
          return '';
      }
    })
    .join('');
}
