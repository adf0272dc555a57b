import type {
  BuildConfig,
  FilesConfig,
  ProjectConfig,
  RenderConfig,
  StorageConfig,
} from '../config.js';

/**
 * バリデーション済みの部分設定（デフォルト値とマージする前）
 */
export interface PartialOrgPressConfig {
  version?: string;
  project?: Partial<ProjectConfig>;
  files?: Partial<FilesConfig>;
  render?: Partial<RenderConfig>;
  build?: Partial<BuildConfig>;
  storage?: Partial<StorageConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`${path}.${key} must be a string`);
  }
  return value;
}

function optionalBoolean(obj: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`${path}.${key} must be a boolean`);
  }
  return value;
}

function optionalNumber(obj: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number') {
    throw new Error(`${path}.${key} must be a number`);
  }
  return value;
}

function optionalStringArray(
  obj: Record<string, unknown>,
  key: string,
  path: string
): string[] | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new Error(`${path}.${key} must be an array`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new Error(`${path}.${key} must be an array of strings`);
    }
    items.push(item);
  }
  return items;
}

function section(config: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = config[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new Error(`config.${key} must be an object`);
  }
  return value;
}

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): PartialOrgPressConfig {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  const result: PartialOrgPressConfig = {
    version: optionalString(config, 'version', 'config'),
  };

  const project = section(config, 'project');
  if (project) {
    result.project = validateProjectConfig(project);
  }

  const files = section(config, 'files');
  if (files) {
    result.files = validateFilesConfig(files);
  }

  const render = section(config, 'render');
  if (render) {
    result.render = validateRenderConfig(render);
  }

  const build = section(config, 'build');
  if (build) {
    result.build = validateBuildConfig(build);
  }

  const storage = section(config, 'storage');
  if (storage) {
    result.storage = validateStorageConfig(storage);
  }

  return result;
}

function validateProjectConfig(project: Record<string, unknown>): Partial<ProjectConfig> {
  return {
    name: optionalString(project, 'name', 'config.project'),
    root: optionalString(project, 'root', 'config.project'),
  };
}

function validateFilesConfig(files: Record<string, unknown>): Partial<FilesConfig> {
  return {
    include: optionalStringArray(files, 'include', 'config.files'),
    exclude: optionalStringArray(files, 'exclude', 'config.files'),
    ignoreGitignore: optionalBoolean(files, 'ignoreGitignore', 'config.files'),
  };
}

function validateRenderConfig(render: Record<string, unknown>): Partial<RenderConfig> {
  const headingOffset = optionalNumber(render, 'headingOffset', 'config.render');
  if (headingOffset !== undefined && (!Number.isInteger(headingOffset) || headingOffset < 0 || headingOffset > 5)) {
    throw new Error('config.render.headingOffset must be an integer between 0 and 5');
  }

  return {
    includeTitle: optionalBoolean(render, 'includeTitle', 'config.render'),
    headingOffset,
    footnotesHeading: optionalString(render, 'footnotesHeading', 'config.render'),
  };
}

function validateBuildConfig(build: Record<string, unknown>): Partial<BuildConfig> {
  const maxConcurrent = optionalNumber(build, 'maxConcurrent', 'config.build');
  if (maxConcurrent !== undefined && (!Number.isInteger(maxConcurrent) || maxConcurrent < 1)) {
    throw new Error('config.build.maxConcurrent must be a positive integer');
  }

  return {
    maxConcurrent,
    force: optionalBoolean(build, 'force', 'config.build'),
  };
}

function validateStorageConfig(storage: Record<string, unknown>): Partial<StorageConfig> {
  return {
    outputPath: optionalString(storage, 'outputPath', 'config.storage'),
    indexFile: optionalString(storage, 'indexFile', 'config.storage'),
  };
}
