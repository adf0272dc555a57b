/**
 * @orgpress/pipeline
 *
 * Org文書 → HTML 変換パイプライン
 */

export { scanBlocks, type RawBlock } from './scanner/block-scanner.js';
export { parseDocument, type ParsedDocument } from './parser/block-parser.js';
export { parseInline, spansToText, type InlineContext, type InlineResult } from './parser/inline-parser.js';
export { extractMetadata, type MetadataResult } from './metadata/metadata-extractor.js';
export { resolveNoweb } from './noweb/noweb-resolver.js';
export { renderHtml, escapeHtml, type RenderOptions } from './renderer/html-renderer.js';
export { processDocument, type ProcessedDocument } from './pipeline.js';
export {
  SiteBuilder,
  type SiteBuilderOptions,
  type BuildOptions,
  type BuildReport,
  type BuildFailure,
} from './builder/site-builder.js';
export { FileDiscovery, type FileDiscoveryOptions } from './discovery/file-discovery.js';
export {
  OrgPressError,
  StructuralError,
  MalformedBlockError,
  UndefinedReferenceError,
  DuplicateFootnoteError,
  CyclicReferenceError,
  UnresolvedFootnoteError,
} from './errors.js';
