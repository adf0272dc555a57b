/**
 * 設定ファイルの型定義
 */

export interface OrgPressConfig {
  version: string;
  project: ProjectConfig;
  files: FilesConfig;
  render: RenderConfig;
  build: BuildConfig;
  storage: StorageConfig;
}

export interface ProjectConfig {
  /** プロジェクト名 */
  name: string;
  /** プロジェクトルート */
  root: string;
}

export interface FilesConfig {
  /** 含めるファイルパターン（glob） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
  /** .gitignoreを尊重するか */
  ignoreGitignore: boolean;
}

export interface RenderConfig {
  /** 文書タイトルを <h1> として出力するか */
  includeTitle: boolean;
  /** 見出しレベルのオフセット（depth 1 → h(1+offset)） */
  headingOffset: number;
  /** 脚注セクションの見出し */
  footnotesHeading: string;
}

export interface BuildConfig {
  /** 同時に処理する文書数 */
  maxConcurrent: number;
  /** ハッシュが変わっていない文書も再生成するか */
  force: boolean;
}

export interface StorageConfig {
  /** 出力先ディレクトリ */
  outputPath: string;
  /** サイトインデックスのファイル名（outputPathからの相対） */
  indexFile: string;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: OrgPressConfig = {
  version: '1.0',
  project: {
    name: '',
    root: '.',
  },
  files: {
    include: ['**/*.org'],
    exclude: ['**/node_modules/**', '**/.git/**', '**/dist/**', '**/.orgpress/**'],
    ignoreGitignore: true,
  },
  render: {
    includeTitle: true,
    headingOffset: 1,
    footnotesHeading: 'Footnotes',
  },
  build: {
    maxConcurrent: 4,
    force: false,
  },
  storage: {
    outputPath: '.orgpress/site',
    indexFile: 'index.json',
  },
};
