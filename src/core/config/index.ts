// src/core/config/index.ts
// Configuration system exports

export {
  type MatcherConfig,
  type RegistryConfig,
  type DiagnosticsConfig,
  type TagmatchConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_MATCHER_CONFIG,
  DEFAULT_REGISTRY_CONFIG,
  DEFAULT_DIAGNOSTICS_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  isLogLevel,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
