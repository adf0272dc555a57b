/**
 * 1文書分の変換パイプライン
 * parse → noweb展開 → HTML描画
 */

import type { Document, DocumentMetadata, MetadataWarning } from '@orgpress/types';
import { parseDocument } from './parser/block-parser.js';
import { resolveNoweb } from './noweb/noweb-resolver.js';
import { renderHtml, type RenderOptions } from './renderer/html-renderer.js';

export interface ProcessedDocument {
  /** noweb 展開済みの文書 */
  document: Document;
  html: string;
  metadata: DocumentMetadata;
  warnings: MetadataWarning[];
}

/**
 * テキストを HTML とメタデータに変換
 *
 * 同期・純粋関数。構造エラーは OrgPressError のサブクラスとして投げる。
 */
export function processDocument(text: string, options?: RenderOptions): ProcessedDocument {
  const { document, warnings } = parseDocument(text);
  const resolved = resolveNoweb(document);
  const html = renderHtml(resolved, options);

  return {
    document: resolved,
    html,
    metadata: resolved.metadata,
    warnings,
  };
}
