// Common types
export { JournalMode, LogLevel, TransactionKind } from './common.js'

// Configuration
export { DatabaseOptionsSchema, RowkeeperConfigSchema } from './config.js'
export type { DatabaseOptions, RowkeeperConfig } from './config.js'
