/**
 * SiteBuilder
 * プロジェクト内のOrg文書を変換し、OutputStorageへ書き出すバッチドライバ
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { nanoid } from 'nanoid';
import type { OrgPressConfig, OutputStorage, SiteIndexEntry } from '@orgpress/types';
import { hashSource } from '@orgpress/storage';
import { FileDiscovery } from '../discovery/file-discovery.js';
import { OrgPressError } from '../errors.js';
import { processDocument } from '../pipeline.js';

export interface SiteBuilderOptions {
  /** プロジェクトルート */
  rootDir: string;
  config: OrgPressConfig;
  storage: OutputStorage;
  /** 差し替え用（省略時は config.files から生成） */
  discovery?: FileDiscovery;
}

export interface BuildOptions {
  /** ハッシュが同じ文書も再生成する（省略時は config.build.force） */
  force?: boolean;
  /** 対象を限定する（プロジェクトルートからの相対パス） */
  paths?: string[];
}

export interface BuildFailure {
  path: string;
  error: {
    name: string;
    message: string;
    line: number | null;
  };
}

export interface BuildReport {
  buildId: string;
  startedAt: Date;
  finishedAt: Date;
  /** 生成した文書 */
  built: string[];
  /** 変更がなくスキップした文書 */
  skipped: string[];
  /** ソースが消えたため削除した出力 */
  removed: string[];
  failed: BuildFailure[];
}

type DocumentOutcome =
  | { status: 'built'; entry: SiteIndexEntry }
  | { status: 'skipped'; entry: SiteIndexEntry }
  | { status: 'failed'; failure: BuildFailure };

export class SiteBuilder {
  private rootDir: string;
  private config: OrgPressConfig;
  private storage: OutputStorage;
  private discovery: FileDiscovery;

  constructor(options: SiteBuilderOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
    this.storage = options.storage;
    this.discovery =
      options.discovery ?? new FileDiscovery({ rootDir: this.rootDir, config: options.config.files });
  }

  /**
   * ビルドを実行
   * 1文書の失敗は他の文書に影響しない（BuildReport.failed に記録）
   */
  async build(options: BuildOptions = {}): Promise<BuildReport> {
    const buildId = nanoid();
    const startedAt = new Date();
    const force = options.force ?? this.config.build.force;
    const fullBuild = !options.paths || options.paths.length === 0;

    const targets = fullBuild ? await this.discovery.findFiles() : (options.paths ?? []);
    console.log(
      `[SiteBuilder] Build ${buildId} started: ${targets.length} documents (maxConcurrent: ${this.config.build.maxConcurrent}, force: ${force})`
    );

    const outcomes = await this.runPool(targets, (target) => this.buildDocument(target, force));

    const report: BuildReport = {
      buildId,
      startedAt,
      finishedAt: startedAt,
      built: [],
      skipped: [],
      removed: [],
      failed: [],
    };
    const entries: SiteIndexEntry[] = [];

    for (const outcome of outcomes) {
      switch (outcome.status) {
        case 'built':
          report.built.push(outcome.entry.path);
          entries.push(outcome.entry);
          break;
        case 'skipped':
          report.skipped.push(outcome.entry.path);
          entries.push(outcome.entry);
          break;
        case 'failed':
          report.failed.push(outcome.failure);
          break;
      }
    }

    const handled = new Set(targets.map(normalizeSourcePath));
    if (fullBuild) {
      report.removed = await this.removeStaleOutputs(handled);
    } else {
      entries.push(...(await this.retainedEntries(handled)));
    }

    await this.storage.saveIndex(entries);

    report.finishedAt = new Date();
    const elapsed = report.finishedAt.getTime() - startedAt.getTime();
    console.log(
      `[SiteBuilder] Build ${buildId} finished in ${elapsed}ms: ${report.built.length} built, ${report.skipped.length} skipped, ${report.removed.length} removed, ${report.failed.length} failed`
    );

    return report;
  }

  /**
   * 1文書を処理
   */
  private async buildDocument(sourcePath: string, force: boolean): Promise<DocumentOutcome> {
    const relativePath = normalizeSourcePath(sourcePath);

    try {
      const text = await fs.readFile(path.join(this.rootDir, relativePath), 'utf-8');
      const sourceHash = this.contentHash(text);

      if (!force) {
        const existing = await this.storage.get(relativePath);
        if (existing && existing.sourceHash === sourceHash) {
          return { status: 'skipped', entry: { path: relativePath, metadata: existing.metadata } };
        }
      }

      const result = processDocument(text, this.config.render);
      for (const warning of result.warnings) {
        console.warn(`[SiteBuilder] ${relativePath}:${warning.line}: ${warning.message}`);
      }

      await this.storage.save(relativePath, {
        path: relativePath,
        html: result.html,
        metadata: result.metadata,
        sourceHash,
        renderedAt: new Date(),
      });

      return { status: 'built', entry: { path: relativePath, metadata: result.metadata } };
    } catch (error) {
      console.error(`[SiteBuilder] Failed to build ${relativePath}:`, error);
      return { status: 'failed', failure: { path: relativePath, error: describeError(error) } };
    }
  }

  /**
   * 描画設定が変わった場合も再生成されるよう、設定をハッシュに含める
   */
  private contentHash(text: string): string {
    return hashSource(`${JSON.stringify(this.config.render)}\n${text}`);
  }

  /**
   * 今回のビルド対象外の出力をインデックス用に読み出す
   */
  private async retainedEntries(handled: ReadonlySet<string>): Promise<SiteIndexEntry[]> {
    const entries: SiteIndexEntry[] = [];
    for (const storedPath of await this.storage.list()) {
      if (handled.has(storedPath)) {
        continue;
      }
      const existing = await this.storage.get(storedPath);
      if (existing) {
        entries.push({ path: storedPath, metadata: existing.metadata });
      }
    }
    return entries;
  }

  /**
   * ソースが存在しなくなった出力を削除
   */
  private async removeStaleOutputs(current: ReadonlySet<string>): Promise<string[]> {
    const removed: string[] = [];
    for (const storedPath of await this.storage.list()) {
      if (!current.has(storedPath)) {
        await this.storage.delete(storedPath);
        removed.push(storedPath);
      }
    }
    if (removed.length > 0) {
      console.log(`[SiteBuilder] Removed ${removed.length} stale outputs`);
    }
    return removed;
  }

  /**
   * 最大 maxConcurrent 件ずつ並行して処理（結果は入力順）
   */
  private async runPool<T, R>(items: readonly T[], task: (item: T) => Promise<R>): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++;
        results[index] = await task(items[index]);
      }
    };

    const workerCount = Math.min(this.config.build.maxConcurrent, items.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
  }
}

function normalizeSourcePath(sourcePath: string): string {
  return path.normalize(sourcePath.replace(/\\/g, '/')).replace(/\\/g, '/');
}

function describeError(error: unknown): BuildFailure['error'] {
  if (error instanceof OrgPressError) {
    return { name: error.name, message: error.message, line: error.line };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, line: null };
  }
  return { name: 'Error', message: String(error), line: null };
}
