export * from './database/index.js'
export * from './model/index.js'
export * from './migration/index.js'
export { createLogger, getDefaultLogger, setDefaultLogger } from './logging/index.js'
export type { LoggerOptions } from './logging/index.js'
export { loadConfig, ConfigError, resolveDatabaseOptions, DEFAULT_CONFIG, DEFAULT_DATABASE_OPTIONS } from './config/index.js'
export { JournalMode, LogLevel, TransactionKind, DatabaseOptionsSchema, RowkeeperConfigSchema } from './types/index.js'
export type { DatabaseOptions, RowkeeperConfig } from './types/index.js'
