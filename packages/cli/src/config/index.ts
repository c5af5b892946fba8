/**
 * Configuration module exports
 */

// Schema types
export type {
  AnalysisProfile,
  LichessConfigSchema,
  RetrievalConfigSchema,
  EngineConfigSchema,
  AnalysisConfigSchema,
  OutputConfigSchema,
  SlipfinderConfig,
  CliOptions,
} from './schema.js';

// Defaults and profiles
export { ANALYSIS_PROFILES, DEFAULT_ENGINE_CONFIG, DEFAULT_CONFIG, applyProfile } from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  analysisProfileSchema,
  sideFilterSchema,
  perfTypeSchema,
  ConfigValidationError,
  validateConfig,
  parsePartialConfig,
  type PartialConfig,
} from './validation.js';

// Loader
export { loadConfig, loadConfigFile, loadEnvConfig, mapCliToConfig, deepMerge, formatConfig, ENV_VAR_MAP } from './loader.js';
