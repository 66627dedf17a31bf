/**
 * Configuration exports
 */

export {
  loadConfig,
  ConfigurationError,
  CONFIG_KEYS,
  type LoadConfigOptions,
} from './loader.js';

export {
  rawConfigSchema,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_MAX_LIST_DEPTH,
  DEFAULT_MAX_LIST_ENTRIES,
  DEFAULT_ALLOWED_EXTENSIONS,
  ANY_EXTENSION,
  LOG_LEVELS,
  type LogLevel,
  type ServerConfig,
} from './schema.js';
