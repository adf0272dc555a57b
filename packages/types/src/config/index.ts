export { ConfigLoader, type ResolveConfigOptions, type ResolvedConfig } from './loader.js';
export { validateConfig, type PartialOrgPressConfig } from './validator.js';
