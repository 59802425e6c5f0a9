// src/core/config/index.ts
// Configuration system exports

export {
  type EofPolicy,
  type LoaderConfig,
  type RuntimeConfig,
  type CaeConfig,
  type ConfigOverrides,
  type ConfigValidation,
  EOF_POLICIES,
  DEFAULT_LOADER_CONFIG,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  isEofPolicy,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
