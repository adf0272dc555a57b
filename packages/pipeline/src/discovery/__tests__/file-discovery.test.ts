import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { FileDiscovery } from '../file-discovery.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';

const TEST_DIR = path.join(tmpdir(), 'orgpress-discovery-test');

describe('FileDiscovery', () => {
  beforeAll(async () => {
    // テスト用ディレクトリとファイルを作成
    await fs.mkdir(path.join(TEST_DIR, 'notes', 'swift'), { recursive: true });
    await fs.mkdir(path.join(TEST_DIR, 'drafts'), { recursive: true });
    await fs.mkdir(path.join(TEST_DIR, 'node_modules'), { recursive: true });

    await fs.writeFile(path.join(TEST_DIR, 'index.org'), '#+title: Index');
    await fs.writeFile(path.join(TEST_DIR, 'notes', 'emacs.org'), '* Emacs');
    await fs.writeFile(path.join(TEST_DIR, 'notes', 'swift', 'optionals.org'), '* Optionals');
    await fs.writeFile(path.join(TEST_DIR, 'notes', 'readme.txt'), 'plain');
    await fs.writeFile(path.join(TEST_DIR, 'drafts', 'wip.org'), '* WIP');
    await fs.writeFile(path.join(TEST_DIR, 'node_modules', 'lib.org'), '* Lib');

    // .gitignoreを作成
    await fs.writeFile(path.join(TEST_DIR, '.gitignore'), 'drafts/\n');
  });

  afterAll(async () => {
    // テスト用ディレクトリ削除
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('findFiles', () => {
    it('includeパターンでファイルをソート済みで検索できる', async () => {
      const discovery = new FileDiscovery({
        rootDir: TEST_DIR,
        config: {
          include: ['**/*.org'],
          exclude: ['**/node_modules/**'],
          ignoreGitignore: false,
        },
      });

      const files = await discovery.findFiles();
      expect(files).toEqual([
        'drafts/wip.org',
        'index.org',
        'notes/emacs.org',
        'notes/swift/optionals.org',
      ]);
    });

    it('excludeパターンでファイルを除外できる', async () => {
      const discovery = new FileDiscovery({
        rootDir: TEST_DIR,
        config: {
          include: ['**/*.org'],
          exclude: ['**/node_modules/**', 'notes/swift/**'],
          ignoreGitignore: false,
        },
      });

      const files = await discovery.findFiles();
      expect(files).toContain('notes/emacs.org');
      expect(files).not.toContain('notes/swift/optionals.org');
      expect(files).not.toContain('node_modules/lib.org');
    });

    it('.gitignoreを尊重できる', async () => {
      const discovery = new FileDiscovery({
        rootDir: TEST_DIR,
        config: {
          include: ['**/*.org'],
          exclude: ['**/node_modules/**'],
          ignoreGitignore: true,
        },
      });

      const files = await discovery.findFiles();
      expect(files).toEqual(['index.org', 'notes/emacs.org', 'notes/swift/optionals.org']);
    });
  });

  describe('matchesPattern', () => {
    it('パターンにマッチするファイルを判定できる', () => {
      const discovery = new FileDiscovery({
        rootDir: TEST_DIR,
        config: {
          include: ['**/*.org'],
          exclude: [],
          ignoreGitignore: false,
        },
      });

      // ルートレベルにも **/ がマッチする
      expect(discovery.matchesPattern('index.org')).toBe(true);
      expect(discovery.matchesPattern('notes/emacs.org')).toBe(true);
      expect(discovery.matchesPattern('notes/readme.txt')).toBe(false);
    });

    it('除外パターンを適用できる', () => {
      const discovery = new FileDiscovery({
        rootDir: TEST_DIR,
        config: {
          include: ['**/*.org'],
          exclude: ['**/node_modules/**'],
          ignoreGitignore: false,
        },
      });

      expect(discovery.matchesPattern('index.org')).toBe(true);
      expect(discovery.matchesPattern('node_modules/lib.org')).toBe(false);
    });
  });

  describe('shouldIgnore', () => {
    it('.gitignoreを考慮できる', async () => {
      const discovery = new FileDiscovery({
        rootDir: TEST_DIR,
        config: {
          include: ['**/*.org'],
          exclude: [],
          ignoreGitignore: true,
        },
      });

      // .gitignoreを読み込むためにfindFilesを呼ぶ
      await discovery.findFiles();

      expect(discovery.shouldIgnore('index.org')).toBe(false);
      expect(discovery.shouldIgnore('drafts/wip.org')).toBe(true);
      expect(discovery.shouldIgnore('notes/readme.txt')).toBe(true);
    });
  });

  describe('存在しないディレクトリ', () => {
    it('存在しないディレクトリでも動作する', async () => {
      const discovery = new FileDiscovery({
        rootDir: path.join(TEST_DIR, 'nonexistent'),
        config: {
          include: ['**/*.org'],
          exclude: [],
          ignoreGitignore: false,
        },
      });

      const files = await discovery.findFiles();
      expect(files).toEqual([]);
    });
  });
});
