/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults.js";
// Loader
export {
  CONFIG_FILE_NAMES,
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseConfigContent,
} from "./loader.js";
// Resolver
export { resolvePaths, resolveRepository, selectRepositories } from "./resolver.js";
// Validator
export { validateConfig } from "./validator.js";
