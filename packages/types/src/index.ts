/**
 * @orgpress/types
 * orgpressの共通型定義
 */

// Document
export type {
  Document,
  DocumentMetadata,
  KeywordLine,
  MetadataWarning,
  ChangelogEntry,
  Footnote,
  Block,
  HeadingBlock,
  ParagraphBlock,
  CodeBlock,
  NowebMode,
  QuoteBlock,
  DrawerBlock,
  DrawerProperty,
  ListBlock,
  ListItem,
  InlineSpan,
  PlainTextSpan,
  BoldSpan,
  ItalicSpan,
  CodeSpan,
  LinkSpan,
  FootnoteRefSpan,
} from './document.js';

// Config
export type {
  OrgPressConfig,
  ProjectConfig,
  FilesConfig,
  RenderConfig,
  BuildConfig,
  StorageConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  validateConfig,
  type ResolveConfigOptions,
  type ResolvedConfig,
  type PartialOrgPressConfig,
} from './config/index.js';

// Storage
export type { OutputStorage, RenderedDocument, SiteIndexEntry } from './storage.js';
export { isFileNotFoundError } from './fs-errors.js';
