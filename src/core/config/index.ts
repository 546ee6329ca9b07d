// src/core/config/index.ts
// Configuration system exports

export {
  type ServerConfig,
  type LogConfig,
  type ReplConfig,
  type SketchConfig,
  type PartialSketchConfig,
  type ConfigValidation,
  DEFAULT_SERVER_CONFIG,
  DEFAULT_LOG_CONFIG,
  DEFAULT_REPL_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
