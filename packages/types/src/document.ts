/**
 * 文書モデルの型定義
 *
 * パーサが1文書につき1回構築し、以降は変更しない（readonly）
 */

// ---------------------------------------------------------------------------
// インライン
// ---------------------------------------------------------------------------

export interface PlainTextSpan {
  type: 'text';
  value: string;
}

export interface BoldSpan {
  type: 'bold';
  children: readonly InlineSpan[];
}

export interface ItalicSpan {
  type: 'italic';
  children: readonly InlineSpan[];
}

export interface CodeSpan {
  type: 'code';
  /** マークアップを含まないリテラル */
  value: string;
}

export interface LinkSpan {
  type: 'link';
  url: string;
  /** 表示テキスト（`[[url]]` の場合はURLそのもの） */
  text: string;
}

export interface FootnoteRefSpan {
  type: 'footnote-ref';
  /** 参照先の脚注ID（描画時に解決する弱参照） */
  id: string;
}

export type InlineSpan =
  | PlainTextSpan
  | BoldSpan
  | ItalicSpan
  | CodeSpan
  | LinkSpan
  | FootnoteRefSpan;

// ---------------------------------------------------------------------------
// 脚注
// ---------------------------------------------------------------------------

export interface Footnote {
  /** ラベル、または匿名脚注の場合は `anon.N` */
  id: string;
  content: readonly InlineSpan[];
  /** `[fn:: ...]` / `[fn:label: ...]` のようにインラインで定義されたか */
  inline: boolean;
  /** 定義位置（1-indexed） */
  line: number;
}

// ---------------------------------------------------------------------------
// ブロック
// ---------------------------------------------------------------------------

interface BlockBase {
  /** 開始行（1-indexed） */
  startLine: number;
  /** 終了行（1-indexed） */
  endLine: number;
}

export interface HeadingBlock extends BlockBase {
  type: 'heading';
  /** 見出しマーカー（`*`）の数 */
  depth: number;
  title: readonly InlineSpan[];
  /** 見出し末尾の `:a:b:` タグ */
  tags: readonly string[];
  children: readonly Block[];
  footnotes: readonly Footnote[];
}

export interface ParagraphBlock extends BlockBase {
  type: 'paragraph';
  content: readonly InlineSpan[];
  /** この段落内でインライン定義された脚注 */
  footnotes: readonly Footnote[];
}

/** noweb参照の扱い（`:noweb` ヘッダ引数から決まる） */
export type NowebMode = 'off' | 'expand' | 'strip';

export interface CodeBlock extends BlockBase {
  type: 'code';
  kind: 'src' | 'example';
  /** 言語タグ（例: "swift"）。example ブロックは null */
  language: string | null;
  text: string;
  /** `#+name:` または `:noweb-ref` で付けられた名前 */
  name: string | null;
  /** 本文中の `<<name>>` 参照（出現順）。noweb が off のときは空 */
  references: readonly string[];
  noweb: NowebMode;
  headerArgs: Readonly<Record<string, string>>;
  caption: string | null;
}

export interface QuoteBlock extends BlockBase {
  type: 'quote';
  /** `quote`、または `#+begin_NAME` の NAME（verse, center 等） */
  variant: string;
  paragraphs: readonly ParagraphBlock[];
}

export interface DrawerProperty {
  key: string;
  value: string;
}

export interface DrawerBlock extends BlockBase {
  type: 'drawer';
  name: string;
  properties: readonly DrawerProperty[];
  /** `:KEY: value` 形式でない行 */
  lines: readonly string[];
}

export interface ListItem {
  content: readonly InlineSpan[];
  footnotes: readonly Footnote[];
  line: number;
}

export interface ListBlock extends BlockBase {
  type: 'list';
  ordered: boolean;
  items: readonly ListItem[];
}

export type Block =
  | HeadingBlock
  | ParagraphBlock
  | CodeBlock
  | QuoteBlock
  | DrawerBlock
  | ListBlock;

// ---------------------------------------------------------------------------
// メタデータ・文書
// ---------------------------------------------------------------------------

export interface ChangelogEntry {
  /** 日付（書式は検証しない） */
  date: string;
  description: string;
}

/**
 * サイトインデックスに渡すメタデータレコード
 */
export interface DocumentMetadata {
  title: string;
  /** 重複なし、宣言順 */
  tags: readonly string[];
  /** 重複なし、宣言順 */
  keywords: readonly string[];
  summary: string;
  date: string;
  author: string;
  changelog: readonly ChangelogEntry[];
  /** その他の先頭キーワード（キーは小文字） */
  properties: Readonly<Record<string, string>>;
}

/** 先頭の `#+key: value` 行 */
export interface KeywordLine {
  /** 小文字化したキー */
  key: string;
  value: string;
  line: number;
}

export interface Document {
  metadata: DocumentMetadata;
  blocks: readonly Block[];
  /** 本文とは別に定義された脚注（`[fn:label] text`） */
  footnotes: readonly Footnote[];
}

/** メタデータの非致命的な問題 */
export interface MetadataWarning {
  message: string;
  line: number;
}
