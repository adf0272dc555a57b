import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import { minimatch } from 'minimatch';
import { isFileNotFoundError, type FilesConfig } from '@orgpress/types';

// ignoreパッケージの型定義（手動）
interface Ignore {
  add(pattern: string | string[]): this;
  ignores(pathname: string): boolean;
}

type IgnoreFactory = () => Ignore;

function isIgnoreFactory(value: unknown): value is IgnoreFactory {
  return typeof value === 'function';
}

export interface FileDiscoveryOptions {
  /** プロジェクトルート */
  rootDir: string;
  /** ファイル検索設定 */
  config: FilesConfig;
}

/**
 * ファイル検索クラス
 * Globパターンと.gitignoreを使用してOrg文書を検索
 */
export class FileDiscovery {
  private rootDir: string;
  private config: FilesConfig;
  private ignoreFilter: Ignore | null = null;

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
  }

  /**
   * ファイルを検索
   * @returns 見つかったファイルのパス一覧（プロジェクトルートからの相対パス、ソート済み）
   */
  async findFiles(): Promise<string[]> {
    if (this.config.ignoreGitignore) {
      await this.loadGitignore();
    }

    const files = await fg(this.config.include, {
      cwd: this.rootDir,
      ignore: this.config.exclude,
      absolute: false, // 相対パスを返す
      onlyFiles: true,
      dot: false, // ドットファイルを除外
    });

    const filter = this.ignoreFilter;
    const visible = filter ? files.filter((file) => !filter.ignores(file)) : files;
    return visible.sort();
  }

  /**
   * パスがパターンにマッチするか判定
   * @param filePath ファイルパス（相対パス）
   */
  matchesPattern(filePath: string): boolean {
    const matchesInclude = this.config.include.some((pattern) => matchesGlob(filePath, pattern));
    if (!matchesInclude) {
      return false;
    }

    return !this.config.exclude.some((pattern) => matchesGlob(filePath, pattern));
  }

  /**
   * パスを除外すべきか判定
   * @param filePath ファイルパス（相対パス）
   */
  shouldIgnore(filePath: string): boolean {
    if (this.config.ignoreGitignore && this.ignoreFilter?.ignores(filePath)) {
      return true;
    }

    return !this.matchesPattern(filePath);
  }

  /**
   * .gitignoreを読み込む
   */
  private async loadGitignore(): Promise<void> {
    const gitignorePath = path.join(this.rootDir, '.gitignore');
    let content: string;
    try {
      content = await fs.readFile(gitignorePath, 'utf-8');
    } catch (error) {
      // .gitignoreが存在しない場合は無視
      if (isFileNotFoundError(error)) {
        return;
      }
      throw error;
    }

    // ignoreパッケージはCommonJSのため動的にロード
    const ignoreModule = await import('ignore');
    const factory: unknown = ignoreModule.default;
    if (!isIgnoreFactory(factory)) {
      throw new Error('ignore package did not export a factory function');
    }
    this.ignoreFilter = factory().add(content);
  }
}

/**
 * minimatchはfast-globと異なり、**\/patternがルートレベルにマッチしない。
 * fast-globの挙動に合わせ、ルートレベルとネストレベルの両方をチェック
 */
function matchesGlob(filePath: string, pattern: string): boolean {
  if (pattern.startsWith('**/')) {
    return minimatch(filePath, pattern) || minimatch(filePath, pattern.slice(3));
  }
  return minimatch(filePath, pattern);
}
