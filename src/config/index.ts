/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `warden config` and `warden profile`.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  ProviderTagSchema,
  EmbeddingProviderTagSchema,
  ProfileOverrideSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  ProviderTag,
  EmbeddingProviderTag,
  ProfileOverride,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  resolveConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  deepMerge,
  parseValue,
} from './loader.js';

// Paths
export { getWardenDir, getDbPath, getConfigPath } from './paths.js';

// Model profiles
export {
  ModelProfileSchema,
  BUILTIN_PROFILES,
  DEFAULT_PROFILE,
  detectProfileName,
  buildProfileCatalog,
  selectModelProfile,
} from './profiles.js';
export type { ModelProfile, ProfileSelection } from './profiles.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasApiKey,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, KeyedProvider } from './env.js';
