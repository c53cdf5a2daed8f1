/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, mergeConfig } from "./defaults";
// Loader
export {
  buildInlineConfig,
  CONFIG_FILE_NAMES,
  ConfigError,
  extractInlineOptions,
  findAndLoadConfig,
  findConfigFile,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  loadConfig,
  mergeInlineConfig,
  type ParsedOptionValues,
} from "./loader";
// Resolver
export { resolvePaths } from "./resolver";
// Validator
export { parseConfigInput, validateConfig } from "./validator";
