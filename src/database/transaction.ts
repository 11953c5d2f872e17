import type { Logger } from 'pino'
import type { TransactionKind } from '../types/common.js'
import type { Connection } from './connection.js'
import { DatabaseMisuseError } from './errors.js'
import type { TransactionCompletion } from './interface.js'

export function isThenable(value: unknown): boolean {
  return (
    value !== null &&
    (typeof value === 'object' || typeof value === 'function') &&
    'then' in value &&
    typeof value.then === 'function'
  )
}

export interface TransactionOptions<T> {
  kind: TransactionKind
  /** Used when the connection is already inside a transaction. */
  savepointName: string
  /** Maps the block's result to an outcome. */
  complete: (result: T) => TransactionCompletion
  logger: Logger
}

interface Scope {
  begin: string
  commit: string[]
  rollback: string[]
}

function scopeFor(db: Connection, kind: TransactionKind, savepointName: string): Scope {
  if (db.isInsideTransaction) {
    return {
      begin: `SAVEPOINT ${savepointName}`,
      commit: [`RELEASE SAVEPOINT ${savepointName}`],
      rollback: [`ROLLBACK TO SAVEPOINT ${savepointName}`, `RELEASE SAVEPOINT ${savepointName}`],
    }
  }
  return {
    begin: `BEGIN ${kind.toUpperCase()} TRANSACTION`,
    commit: ['COMMIT TRANSACTION'],
    rollback: ['ROLLBACK TRANSACTION'],
  }
}

function rollback(db: Connection, scope: Scope): void {
  // The engine may already have rolled back on its own (e.g. SQLITE_FULL).
  if (!db.isInsideTransaction) return
  for (const sql of scope.rollback) {
    db.execute(sql)
  }
}

/**
 * Run `block` between begin and commit/rollback on `db`.
 *
 * Inside an open transaction the unit becomes a savepoint, so a rolled
 * back inner unit leaves the outer one intact. When the block throws, the
 * unit is rolled back and the block's error is rethrown; a failing
 * rollback is logged and does not mask it.
 */
export function runTransaction<T>(
  db: Connection,
  block: (db: Connection) => T,
  options: TransactionOptions<T>,
): T {
  const scope = scopeFor(db, options.kind, options.savepointName)
  db.execute(scope.begin)

  try {
    const result = block(db)
    if (isThenable(result)) {
      throw new DatabaseMisuseError('Transaction blocks must be synchronous; the block returned a promise')
    }
    if (options.complete(result) === 'commit') {
      for (const sql of scope.commit) {
        db.execute(sql)
      }
    } else {
      rollback(db, scope)
      options.logger.debug('transaction rolled back')
    }
    return result
  } catch (err) {
    try {
      rollback(db, scope)
      options.logger.debug({ err }, 'transaction rolled back after error')
    } catch (rollbackErr) {
      options.logger.error({ err: rollbackErr, cause: err }, 'rollback failed')
    }
    throw err
  }
}
