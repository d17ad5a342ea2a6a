/**
 * Config module exports.
 */

export type { MonitorConfigFile, MergedConfig, LogLevelName } from './config-schema.js';
export { DEFAULT_CONFIG, CONFIG_FILE_VERSION, monitorConfigFileSchema } from './config-schema.js';
export { ConfigLoader, createConfigLoader, loadConfig } from './config-loader.js';
