/**
 * Config module exports.
 */

export type { BotConfigFile, LogLevel, MergedConfig } from './config-schema.js';
export {
  DEFAULT_CONFIG,
  CONFIG_FILE_VERSION,
  LOG_LEVELS,
  botConfigFileSchema,
} from './config-schema.js';
export {
  CONFIG_FILE_NAME,
  ConfigLoader,
  createConfigLoader,
  loadConfig,
} from './config-loader.js';
