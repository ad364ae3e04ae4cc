// src/core/config/index.ts
// Configuration system exports

export {
  type ServerConfig,
  type LogConfig,
  type StackDbConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_SERVER_CONFIG,
  DEFAULT_LOG_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
