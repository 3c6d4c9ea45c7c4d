// src/core/config/index.ts
// Configuration system exports

export {
  type OutputConfig,
  type RecurforgeConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_OUTPUT_CONFIG,
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
