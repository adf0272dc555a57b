import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { DEFAULT_CONFIG, type OrgPressConfig } from '@orgpress/types';
import { FileStorage } from '@orgpress/storage';
import { SiteBuilder } from '../site-builder.js';

const config: OrgPressConfig = {
  ...DEFAULT_CONFIG,
  files: { ...DEFAULT_CONFIG.files, ignoreGitignore: false },
  build: { maxConcurrent: 2, force: false },
};

describe('SiteBuilder', () => {
  let rootDir: string;
  let outputDir: string;
  let storage: FileStorage;
  let builder: SiteBuilder;

  const writeSource = async (relativePath: string, content: string): Promise<void> => {
    const fullPath = path.join(rootDir, relativePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content);
  };

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(tmpdir(), 'orgpress-builder-test-'));
    outputDir = path.join(rootDir, '.orgpress', 'site');
    storage = new FileStorage({ basePath: outputDir });
    builder = new SiteBuilder({ rootDir, config, storage });

    await writeSource('a.org', '#+title: A\n* Intro\nHello');
    await writeSource('broken.org', '#+begin_src sh\necho');
    await writeSource('notes/b.org', '#+title: B\nBody');

    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('文書ごとに失敗を分離してビルドする', async () => {
    const report = await builder.build();

    expect(report.buildId).toMatch(/^[\w-]{21}$/);
    expect(report.built).toEqual(['a.org', 'notes/b.org']);
    expect(report.skipped).toEqual([]);
    expect(report.removed).toEqual([]);
    expect(report.failed).toEqual([
      {
        path: 'broken.org',
        error: { name: 'MalformedBlockError', message: 'Unterminated src block (line 1)', line: 1 },
      },
    ]);
    expect(report.finishedAt.getTime()).toBeGreaterThanOrEqual(report.startedAt.getTime());

    const saved = await storage.get('a.org');
    expect(saved?.html).toBe(
      '<h1 class="title">A</h1>\n<section id="sec-1" class="outline-1">\n<h2>Intro</h2>\n<p>Hello</p>\n</section>'
    );
    expect(await storage.exists('broken.org')).toBe(false);
  });

  it('成功した文書のサイトインデックスを書き出す', async () => {
    await builder.build();

    const index: unknown = JSON.parse(await fs.readFile(path.join(outputDir, 'index.json'), 'utf-8'));
    expect(index).toMatchObject([
      { path: 'a.org', metadata: { title: 'A' } },
      { path: 'notes/b.org', metadata: { title: 'B' } },
    ]);
  });

  it('変更のない文書はスキップし、force で再生成する', async () => {
    await builder.build();

    const second = await builder.build();
    expect(second.built).toEqual([]);
    expect(second.skipped).toEqual(['a.org', 'notes/b.org']);

    const forced = await builder.build({ force: true });
    expect(forced.built).toEqual(['a.org', 'notes/b.org']);
    expect(forced.skipped).toEqual([]);
  });

  it('変更された文書だけを再生成する', async () => {
    await builder.build();
    await writeSource('a.org', '#+title: A2\nChanged');

    const report = await builder.build();
    expect(report.built).toEqual(['a.org']);
    expect(report.skipped).toEqual(['notes/b.org']);
    expect((await storage.get('a.org'))?.metadata.title).toBe('A2');
  });

  it('ソースが消えた出力を削除する', async () => {
    await builder.build();
    await fs.rm(path.join(rootDir, 'notes', 'b.org'));

    const report = await builder.build();
    expect(report.removed).toEqual(['notes/b.org']);
    expect(await storage.list()).toEqual(['a.org']);
  });

  it('paths を指定した場合は対象だけを処理し、他の出力は残す', async () => {
    await builder.build();

    const report = await builder.build({ paths: ['a.org'], force: true });
    expect(report.built).toEqual(['a.org']);
    expect(report.removed).toEqual([]);
    expect(await storage.list()).toEqual(['a.org', 'notes/b.org']);
  });

  it('paths を指定した場合もサイトインデックスに他の文書を残す', async () => {
    await builder.build();
    await writeSource('a.org', '#+title: A2\nChanged');

    await builder.build({ paths: ['a.org'], force: true });

    const index: unknown = JSON.parse(await fs.readFile(path.join(outputDir, 'index.json'), 'utf-8'));
    expect(index).toMatchObject([
      { path: 'a.org', metadata: { title: 'A2' } },
      { path: 'notes/b.org', metadata: { title: 'B' } },
    ]);
  });

  it('paths のビルドで失敗した文書はサイトインデックスから外す', async () => {
    await builder.build();
    await writeSource('a.org', '#+begin_src sh\necho');

    const report = await builder.build({ paths: ['a.org'] });
    expect(report.failed.map((failure) => failure.path)).toEqual(['a.org']);

    const index: unknown = JSON.parse(await fs.readFile(path.join(outputDir, 'index.json'), 'utf-8'));
    expect(index).toMatchObject([{ path: 'notes/b.org', metadata: { title: 'B' } }]);
    expect(index).toHaveLength(1);
  });

  it('描画設定が変わった場合は変更のない文書も再生成する', async () => {
    await builder.build();

    const reconfigured = new SiteBuilder({
      rootDir,
      config: { ...config, render: { ...config.render, headingOffset: 2 } },
      storage,
    });
    const report = await reconfigured.build();

    expect(report.built).toEqual(['a.org', 'notes/b.org']);
    expect(report.skipped).toEqual([]);
    expect((await storage.get('a.org'))?.html).toBe(
      '<h1 class="title">A</h1>\n<section id="sec-1" class="outline-1">\n<h3>Intro</h3>\n<p>Hello</p>\n</section>'
    );
  });

  it('存在しないパスは失敗として記録する', async () => {
    const report = await builder.build({ paths: ['missing.org'] });

    expect(report.failed).toHaveLength(1);
    expect(report.failed[0].path).toBe('missing.org');
    expect(report.failed[0].error.line).toBeNull();
  });

  it('メタデータの警告をパスと行番号付きでログに出す', async () => {
    await writeSource('dup.org', '#+title: One\n#+title: Two\nBody');

    await builder.build({ paths: ['dup.org'] });

    expect(console.warn).toHaveBeenCalledWith('[SiteBuilder] dup.org:2: Duplicate #+title ignored');
  });
});
