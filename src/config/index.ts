/**
 * Configuration module exports
 */

export { DEFAULT_CONFIG, DEFAULT_CONFIG_PATHS, deepMerge, isRecord } from "./defaults";
export {
  applyOverrides,
  CONFIG_FILE_NAMES,
  type ConfigOverrides,
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  SYSTEM_CONFIG_PATH,
} from "./loader";
export { resolvePaths } from "./resolver";
export { validateConfig } from "./validator";
