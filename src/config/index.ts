export { loadConfig, ConfigError, type ConfigErrorCode } from './loader.js'
export { resolveDatabaseOptions } from './options.js'
export { DEFAULT_CONFIG, DEFAULT_DATABASE_OPTIONS } from './defaults.js'
