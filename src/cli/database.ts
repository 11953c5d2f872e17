import { ConfigError, DEFAULT_CONFIG, loadConfig } from '../config/index.js'
import { AccessQueue } from '../database/access-queue.js'
import { createLogger } from '../logging/index.js'
import type { RowkeeperConfig } from '../types/config.js'

/** Options shared by every command that opens a database. */
export interface DatabaseCommandOptions {
  config: string
  database?: string
}

/**
 * With --database the config file is optional: a missing file means
 * defaults. Without it the config file must name the database.
 */
function resolveConfig(options: DatabaseCommandOptions): RowkeeperConfig {
  try {
    return loadConfig(options.config)
  } catch (err) {
    if (options.database && err instanceof ConfigError && err.code === 'NOT_FOUND') return DEFAULT_CONFIG
    throw err
  }
}

/** Open the database named by --database, or by the config file. */
export function openDatabase(options: DatabaseCommandOptions): AccessQueue {
  const config = resolveConfig(options)
  const { path, ...databaseOptions } = config.database
  return AccessQueue.open(options.database ?? path, {
    ...databaseOptions,
    logger: createLogger(config.logging),
  })
}
