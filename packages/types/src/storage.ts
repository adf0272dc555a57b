/**
 * OutputStorageインターフェイス
 */

import type { DocumentMetadata } from './document.js';

/** 1文書分の生成結果 */
export interface RenderedDocument {
  /** ソースのパス（プロジェクトルートからの相対、キー） */
  path: string;
  html: string;
  metadata: DocumentMetadata;
  /** ソース本文と描画設定のハッシュ（変更検知用） */
  sourceHash: string;
  /** 生成日時 */
  renderedAt: Date;
}

/** サイトインデックスの1エントリ */
export interface SiteIndexEntry {
  path: string;
  metadata: DocumentMetadata;
}

export interface OutputStorage {
  /**
   * 生成結果を保存
   */
  save(path: string, output: RenderedDocument): Promise<void>;

  /**
   * 生成結果を取得
   */
  get(path: string): Promise<RenderedDocument | null>;

  /**
   * 生成結果を削除
   */
  delete(path: string): Promise<void>;

  /**
   * すべての文書パスを取得
   */
  list(): Promise<string[]>;

  /**
   * 生成結果の存在確認
   */
  exists(path: string): Promise<boolean>;

  /**
   * サイトインデックスを書き出す
   */
  saveIndex(entries: SiteIndexEntry[]): Promise<void>;
}
