import type { DatabaseOptions, RowkeeperConfig } from '../types/config.js'

/** Default open options matching TypeBox schema defaults */
export const DEFAULT_DATABASE_OPTIONS: DatabaseOptions = {
  readonly: false,
  create: true,
  timeoutMs: 5000,
  journalMode: 'wal',
  foreignKeys: true,
}

/** Default project configuration */
export const DEFAULT_CONFIG: RowkeeperConfig = {
  database: {
    path: './data/app.db',
    ...DEFAULT_DATABASE_OPTIONS,
  },
  logging: {
    level: 'warn',
    pretty: false,
  },
}
