import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { OrgPressConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { isFileNotFoundError } from '../fs-errors.js';
import { validateConfig, type PartialOrgPressConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 設定ファイルが必須かどうか（デフォルト: false）。trueの場合、見つからなければエラー */
  requireConfig?: boolean;
}

export interface ResolvedConfig {
  config: OrgPressConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .orgpress.json > orgpress.json
 */
const CONFIG_FILE_NAMES = ['.orgpress.json', 'orgpress.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス（デフォルト: ./orgpress.json）
   * @returns 設定オブジェクト
   */
  static async load(configPath: string = './orgpress.json'): Promise<OrgPressConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      const config = validateConfig(parsed);

      return this.mergeWithDefaults(config);
    } catch (error) {
      if (isFileNotFoundError(error)) {
        // ファイルが存在しない場合はデフォルト設定を返す
        return DEFAULT_CONFIG;
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd(), requireConfig = false } = options;

    // 1. 設定ファイルパスを解決
    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    if (!configPath && requireConfig) {
      throw new Error(
        'Configuration file not found. Please create orgpress.json in the project root.'
      );
    }

    if (!configPath) {
      // 設定ファイルが見つからない場合はカレントディレクトリを使用
      return {
        config: this.getDefaultConfig(),
        configPath: null,
        projectRoot: await this.normalizeProjectRoot(cwd),
      };
    }

    // 2. 設定を読み込む
    const config = await this.load(configPath);

    // 3. プロジェクトルートを決定（project.root は設定ファイルからの相対）
    const configDir = path.dirname(configPath);
    const projectRoot = await this.normalizeProjectRoot(path.resolve(configDir, config.project.root));

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): OrgPressConfig {
    return DEFAULT_CONFIG;
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(
    startDir: string = process.cwd(),
    traverseUp: boolean = true
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 優先順位: 明示指定 > 環境変数 ORGPRESS_CONFIG > 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env.ORGPRESS_CONFIG;
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/\/$/, '');
    } catch (error) {
      if (isFileNotFoundError(error)) {
        // ディレクトリが存在しない場合は絶対パスをそのまま返す
        return absolutePath.replace(/\/$/, '');
      }
      throw error;
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: PartialOrgPressConfig): OrgPressConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      project: {
        name: config.project?.name ?? DEFAULT_CONFIG.project.name,
        root: config.project?.root ?? DEFAULT_CONFIG.project.root,
      },
      files: {
        include: config.files?.include ?? DEFAULT_CONFIG.files.include,
        exclude: config.files?.exclude ?? DEFAULT_CONFIG.files.exclude,
        ignoreGitignore: config.files?.ignoreGitignore ?? DEFAULT_CONFIG.files.ignoreGitignore,
      },
      render: {
        includeTitle: config.render?.includeTitle ?? DEFAULT_CONFIG.render.includeTitle,
        headingOffset: config.render?.headingOffset ?? DEFAULT_CONFIG.render.headingOffset,
        footnotesHeading:
          config.render?.footnotesHeading ?? DEFAULT_CONFIG.render.footnotesHeading,
      },
      build: {
        maxConcurrent: config.build?.maxConcurrent ?? DEFAULT_CONFIG.build.maxConcurrent,
        force: config.build?.force ?? DEFAULT_CONFIG.build.force,
      },
      storage: {
        outputPath: config.storage?.outputPath ?? DEFAULT_CONFIG.storage.outputPath,
        indexFile: config.storage?.indexFile ?? DEFAULT_CONFIG.storage.indexFile,
      },
    };
  }
}
