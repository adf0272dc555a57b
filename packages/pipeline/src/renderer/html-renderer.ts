import type {
  Block,
  CodeBlock,
  Document,
  DrawerBlock,
  Footnote,
  HeadingBlock,
  InlineSpan,
  ListBlock,
  QuoteBlock,
  RenderConfig,
} from '@orgpress/types';
import { DEFAULT_CONFIG } from '@orgpress/types';
import { UnresolvedFootnoteError } from '../errors.js';

export type RenderOptions = RenderConfig;

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * ブロック・脚注から文書スコープの脚注表を作る（IDによる弱参照の解決先）
 */
function collectFootnotes(document: Document): Map<string, Footnote> {
  const table = new Map<string, Footnote>();
  const add = (footnotes: readonly Footnote[]): void => {
    for (const footnote of footnotes) {
      table.set(footnote.id, footnote);
    }
  };

  const walk = (blocks: readonly Block[]): void => {
    for (const block of blocks) {
      switch (block.type) {
        case 'heading':
          add(block.footnotes);
          walk(block.children);
          break;
        case 'paragraph':
          add(block.footnotes);
          break;
        case 'quote':
          walk(block.paragraphs);
          break;
        case 'list':
          for (const item of block.items) {
            add(item.footnotes);
          }
          break;
        case 'code':
        case 'drawer':
          break;
      }
    }
  };

  add(document.footnotes);
  walk(document.blocks);
  return table;
}

/**
 * Document を HTML に変換するレンダラ（1回の描画ごとに生成）
 */
class HtmlRenderer {
  private readonly footnotes: Map<string, Footnote>;
  /** 脚注ID → 表示番号（最初に参照された順） */
  private readonly numbers = new Map<string, number>();
  /** 脚注ID → これまでの参照回数 */
  private readonly refCounts = new Map<string, number>();
  private readonly order: Footnote[] = [];

  constructor(
    private readonly document: Document,
    private readonly options: RenderOptions
  ) {
    this.footnotes = collectFootnotes(document);
  }

  render(): string {
    const parts: string[] = [];
    const { title } = this.document.metadata;

    if (this.options.includeTitle && title.length > 0) {
      parts.push(`<h1 class="title">${escapeHtml(title)}</h1>`);
    }

    parts.push(...this.renderBlocks(this.document.blocks, []));

    const footnotes = this.renderFootnotes();
    if (footnotes) {
      parts.push(footnotes);
    }

    return parts.join('\n');
  }

  private renderBlocks(blocks: readonly Block[], sectionNumber: readonly number[]): string[] {
    let headingIndex = 0;
    return blocks.map((block) => {
      if (block.type === 'heading') {
        headingIndex++;
        return this.renderHeading(block, [...sectionNumber, headingIndex]);
      }
      return this.renderBlock(block);
    });
  }

  private renderBlock(block: Exclude<Block, HeadingBlock>): string {
    switch (block.type) {
      case 'paragraph':
        return `<p>${this.renderInline(block.content)}</p>`;
      case 'code':
        return this.renderCode(block);
      case 'quote':
        return this.renderQuote(block);
      case 'drawer':
        return this.renderDrawer(block);
      case 'list':
        return this.renderList(block);
    }
  }

  private headingLevel(depth: number): number {
    return Math.min(6, depth + this.options.headingOffset);
  }

  private renderHeading(block: HeadingBlock, sectionNumber: readonly number[]): string {
    const level = this.headingLevel(block.depth);
    const id = `sec-${sectionNumber.join('-')}`;
    return [
      `<section id="${id}" class="outline-${block.depth}">`,
      `<h${level}>${this.renderInline(block.title)}</h${level}>`,
      ...this.renderBlocks(block.children, sectionNumber),
      '</section>',
    ].join('\n');
  }

  /**
   * 言語タグは下流のシンタックスハイライタ向けにクラスとして残す
   */
  private renderCode(block: CodeBlock): string {
    const code = escapeHtml(block.text);
    let pre: string;
    if (block.kind === 'example') {
      pre = `<pre class="example">${code}</pre>`;
    } else if (block.language === null) {
      pre = `<pre class="src"><code>${code}</code></pre>`;
    } else {
      const language = escapeHtml(block.language);
      pre = `<pre class="src src-${language}"><code class="language-${language}">${code}</code></pre>`;
    }

    if (block.caption === null) {
      return pre;
    }
    return `<figure>\n${pre}\n<figcaption>${escapeHtml(block.caption)}</figcaption>\n</figure>`;
  }

  private renderQuote(block: QuoteBlock): string {
    const paragraphs = block.paragraphs.map((paragraph) => `<p>${this.renderInline(paragraph.content)}</p>`);
    if (block.variant === 'quote') {
      return ['<blockquote>', ...paragraphs, '</blockquote>'].join('\n');
    }
    return [`<div class="${escapeHtml(block.variant)}">`, ...paragraphs, '</div>'].join('\n');
  }

  private renderDrawer(block: DrawerBlock): string {
    const entries = block.properties.map(
      (property) => `<dt>${escapeHtml(property.key)}</dt><dd>${escapeHtml(property.value)}</dd>`
    );
    const lines = block.lines.map((line) => `<dd>${escapeHtml(line)}</dd>`);
    return [
      `<dl class="drawer drawer-${escapeHtml(block.name.toLowerCase())}">`,
      ...entries,
      ...lines,
      '</dl>',
    ].join('\n');
  }

  private renderList(block: ListBlock): string {
    const tag = block.ordered ? 'ol' : 'ul';
    const items = block.items.map((item) => `<li>${this.renderInline(item.content)}</li>`);
    return [`<${tag}>`, ...items, `</${tag}>`].join('\n');
  }

  private renderInline(spans: readonly InlineSpan[]): string {
    return spans.map((span) => this.renderSpan(span)).join('');
  }

  private renderSpan(span: InlineSpan): string {
    switch (span.type) {
      case 'text':
        return escapeHtml(span.value);
      case 'bold':
        return `<b>${this.renderInline(span.children)}</b>`;
      case 'italic':
        return `<i>${this.renderInline(span.children)}</i>`;
      case 'code':
        return `<code>${escapeHtml(span.value)}</code>`;
      case 'link':
        return `<a href="${escapeHtml(span.url)}">${escapeHtml(span.text)}</a>`;
      case 'footnote-ref':
        return this.renderFootnoteRef(span.id);
    }
  }

  /**
   * 参照位置に番号付きリンクを出力。定義がなければ UnresolvedFootnoteError
   */
  private renderFootnoteRef(id: string): string {
    const footnote = this.footnotes.get(id);
    if (!footnote) {
      throw new UnresolvedFootnoteError(id);
    }

    let number = this.numbers.get(id);
    if (number === undefined) {
      number = this.order.length + 1;
      this.numbers.set(id, number);
      this.order.push(footnote);
    }

    const count = (this.refCounts.get(id) ?? 0) + 1;
    this.refCounts.set(id, count);
    const refId = count === 1 ? `fnr.${number}` : `fnr.${number}.${count}`;

    return `<sup><a class="footref" id="${refId}" href="#fn.${number}">${number}</a></sup>`;
  }

  /**
   * 参照された脚注を番号順に出力（脚注本文中の参照も含む）
   */
  private renderFootnotes(): string | null {
    if (this.order.length === 0) {
      return null;
    }

    const definitions: string[] = [];
    // 本文の描画中に order が伸びることがあるので添字で回す
    for (let index = 0; index < this.order.length; index++) {
      const footnote = this.order[index];
      const number = index + 1;
      const body = this.renderInline(footnote.content);
      definitions.push(
        `<div class="footdef"><sup><a id="fn.${number}" class="footnum" href="#fnr.${number}">${number}</a></sup> <div class="footpara">${body}</div></div>`
      );
    }

    const level = this.headingLevel(1);
    return [
      '<div id="footnotes">',
      `<h${level} class="footnotes">${escapeHtml(this.options.footnotesHeading)}</h${level}>`,
      ...definitions,
      '</div>',
    ].join('\n');
  }
}

/**
 * Document を HTML 断片に変換する（深さ優先）
 */
export function renderHtml(document: Document, options: RenderOptions = DEFAULT_CONFIG.render): string {
  return new HtmlRenderer(document, options).render();
}
