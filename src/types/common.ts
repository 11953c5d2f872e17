import { Type, type Static } from '@sinclair/typebox'

/** SQLite journal modes accepted at open */
export const JournalMode = Type.Union([
  Type.Literal('wal'),
  Type.Literal('delete'),
  Type.Literal('truncate'),
  Type.Literal('persist'),
  Type.Literal('memory'),
  Type.Literal('off'),
])
export type JournalMode = Static<typeof JournalMode>

/** pino log levels */
export const LogLevel = Type.Union([
  Type.Literal('fatal'),
  Type.Literal('error'),
  Type.Literal('warn'),
  Type.Literal('info'),
  Type.Literal('debug'),
  Type.Literal('trace'),
  Type.Literal('silent'),
])
export type LogLevel = Static<typeof LogLevel>

/** Transaction begin modes */
export const TransactionKind = Type.Union([
  Type.Literal('deferred'),
  Type.Literal('immediate'),
  Type.Literal('exclusive'),
])
export type TransactionKind = Static<typeof TransactionKind>
