import { Type, type Static } from '@sinclair/typebox'
import { JournalMode, LogLevel } from './common.js'

/** Options accepted by AccessQueue.open */
export const DatabaseOptionsSchema = Type.Object(
  {
    readonly: Type.Boolean({ default: false }),
    create: Type.Boolean({ default: true }),
    timeoutMs: Type.Integer({ minimum: 0, default: 5000 }),
    journalMode: JournalMode,
    foreignKeys: Type.Boolean({ default: true }),
  },
  { additionalProperties: false },
)

export type DatabaseOptions = Static<typeof DatabaseOptionsSchema>

/** Project configuration schema for rowkeeper.config.json */
export const RowkeeperConfigSchema = Type.Object({
  database: Type.Object(
    {
      path: Type.String({ minLength: 1, default: './data/app.db' }),
      ...DatabaseOptionsSchema.properties,
    },
    { additionalProperties: false },
  ),
  logging: Type.Object({
    level: LogLevel,
    pretty: Type.Boolean({ default: false }),
  }),
})

export type RowkeeperConfig = Static<typeof RowkeeperConfigSchema>
