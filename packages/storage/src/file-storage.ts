/**
 * ファイルベースのOutputStorage実装
 */

import { promises as fs, type Dirent } from 'node:fs';
import { join, dirname, normalize, extname } from 'node:path';
import { createHash } from 'node:crypto';
import {
  isFileNotFoundError,
  type DocumentMetadata,
  type OutputStorage,
  type RenderedDocument,
  type SiteIndexEntry,
} from '@orgpress/types';

export interface FileStorageOptions {
  /** 出力のベースディレクトリ */
  basePath: string;
  /** サイトインデックスのファイル名（basePathからの相対、デフォルト: index.json） */
  indexFile?: string;
}

/** `<name>.meta.json` に保存する内容（HTMLは別ファイル） */
interface StoredRecord {
  path: string;
  metadata: DocumentMetadata;
  sourceHash: string;
  renderedAt: string;
}

const RECORD_SUFFIX = '.meta.json';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isMetadata(value: unknown): value is DocumentMetadata {
  return (
    isObject(value) &&
    typeof value.title === 'string' &&
    isStringArray(value.tags) &&
    isStringArray(value.keywords) &&
    typeof value.summary === 'string' &&
    typeof value.date === 'string' &&
    typeof value.author === 'string' &&
    Array.isArray(value.changelog) &&
    isObject(value.properties)
  );
}

function isStoredRecord(value: unknown): value is StoredRecord {
  return (
    isObject(value) &&
    typeof value.path === 'string' &&
    typeof value.sourceHash === 'string' &&
    typeof value.renderedAt === 'string' &&
    isMetadata(value.metadata)
  );
}

/**
 * ソース本文のハッシュを計算（変更検知用）
 */
export function hashSource(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * ファイルベースのOutputStorage
 * `<path>.html` と `<path>.meta.json` の組で保存（拡張子は除く）
 */
export class FileStorage implements OutputStorage {
  private basePath: string;
  private indexFile: string;

  constructor(options: FileStorageOptions) {
    this.basePath = normalize(options.basePath);
    this.indexFile = options.indexFile ?? 'index.json';
  }

  /**
   * 生成結果を保存
   */
  async save(path: string, output: RenderedDocument): Promise<void> {
    const normalizedPath = this.normalizePath(path);
    const stem = this.getStem(normalizedPath);

    await fs.mkdir(dirname(stem), { recursive: true });

    const record: StoredRecord = {
      path: normalizedPath,
      metadata: output.metadata,
      sourceHash: output.sourceHash,
      renderedAt: output.renderedAt.toISOString(),
    };

    await fs.writeFile(`${stem}.html`, output.html, 'utf-8');
    await fs.writeFile(`${stem}${RECORD_SUFFIX}`, JSON.stringify(record, null, 2), 'utf-8');
  }

  /**
   * 生成結果を取得
   */
  async get(path: string): Promise<RenderedDocument | null> {
    const stem = this.getStem(this.normalizePath(path));

    let recordText: string;
    let html: string;
    try {
      recordText = await fs.readFile(`${stem}${RECORD_SUFFIX}`, 'utf-8');
      html = await fs.readFile(`${stem}.html`, 'utf-8');
    } catch (error) {
      if (isFileNotFoundError(error)) {
        return null;
      }
      throw error;
    }

    const record: unknown = JSON.parse(recordText);
    if (!isStoredRecord(record)) {
      throw new Error(`Invalid output record: ${stem}${RECORD_SUFFIX}`);
    }

    return {
      path: record.path,
      html,
      metadata: record.metadata,
      sourceHash: record.sourceHash,
      // Date型に変換
      renderedAt: new Date(record.renderedAt),
    };
  }

  /**
   * 生成結果を削除
   */
  async delete(path: string): Promise<void> {
    const stem = this.getStem(this.normalizePath(path));

    for (const file of [`${stem}.html`, `${stem}${RECORD_SUFFIX}`]) {
      try {
        await fs.unlink(file);
      } catch (error) {
        // 既に存在しない場合はエラーにしない
        if (!isFileNotFoundError(error)) {
          throw error;
        }
      }
    }
  }

  /**
   * すべての文書パスを取得
   */
  async list(): Promise<string[]> {
    const paths: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        if (isFileNotFoundError(error)) {
          // ディレクトリが存在しない場合は空配列を返す
          return;
        }
        throw error;
      }

      for (const entry of entries) {
        const fullPath = join(dir, entry.name);

        if (entry.isDirectory()) {
          await walk(fullPath);
        } else if (entry.isFile() && entry.name.endsWith(RECORD_SUFFIX)) {
          const record: unknown = JSON.parse(await fs.readFile(fullPath, 'utf-8'));
          if (isStoredRecord(record)) {
            paths.push(record.path);
          }
        }
      }
    };

    await walk(this.basePath);
    return paths.sort();
  }

  /**
   * 生成結果の存在確認
   */
  async exists(path: string): Promise<boolean> {
    const stem = this.getStem(this.normalizePath(path));

    try {
      await fs.access(`${stem}${RECORD_SUFFIX}`);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * サイトインデックスを書き出す
   */
  async saveIndex(entries: SiteIndexEntry[]): Promise<void> {
    const indexPath = join(this.basePath, this.indexFile);
    await fs.mkdir(dirname(indexPath), { recursive: true });

    const sorted = [...entries].sort((a, b) => a.path.localeCompare(b.path));
    await fs.writeFile(indexPath, JSON.stringify(sorted, null, 2), 'utf-8');
  }

  /**
   * パスを正規化
   */
  private normalizePath(path: string): string {
    return normalize(path.replace(/\\/g, '/')).replace(/\\/g, '/');
  }

  /**
   * 出力ファイルの共通部分（拡張子を除いたパス）
   */
  private getStem(normalizedPath: string): string {
    const extension = extname(normalizedPath);
    const withoutExtension = extension ? normalizedPath.slice(0, -extension.length) : normalizedPath;
    return join(this.basePath, withoutExtension);
  }
}
