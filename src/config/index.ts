/**
 * Config module exports.
 */

export type { SoulConfigFile, MergedConfig, FeatureFlags } from './config-schema.js';
export { DEFAULT_CONFIG, CONFIG_FILE_VERSION, createDefaultConfig } from './config-schema.js';
export { validateConfig, parseConfigFile } from './config-validation.js';
export type { ConfigSummary } from './difficulty.js';
export { adjustDifficulty, withFeatures, getConfigSummary } from './difficulty.js';
export { ConfigLoader, createConfigLoader, loadConfig } from './config-loader.js';
