import type { TransactionKind } from '../types/common.js'
import type { Connection } from './connection.js'

/** Outcome a transaction block reports. */
export type TransactionCompletion = 'commit' | 'rollback'

/**
 * Serialized access to one database.
 *
 * Every operation runs as a synchronous block handed the connection. Blocks
 * run one at a time; a block submitted from inside another runs inline.
 */
export interface DatabaseAccess {
  /** Run a block outside of any implicit transaction and return its result. */
  inDatabase<T>(block: (db: Connection) => T): T

  /**
   * Run a block inside a transaction. Commits when the block returns
   * 'commit'; rolls back when it returns 'rollback' or throws.
   */
  inTransaction(
    block: (db: Connection) => TransactionCompletion,
    kind?: TransactionKind,
  ): TransactionCompletion

  /** Run a block in a transaction committed on normal return. */
  write<T>(block: (db: Connection) => T): T

  /** Run a block in which every write fails. */
  read<T>(block: (db: Connection) => T): T

  /** Close the underlying connection. */
  close(): void
}
