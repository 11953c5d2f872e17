import Database from 'better-sqlite3'
import type { Logger } from 'pino'
import { resolveDatabaseOptions } from '../config/options.js'
import { getDefaultLogger } from '../logging/logger.js'
import type { TransactionKind } from '../types/common.js'
import type { DatabaseOptions } from '../types/config.js'
import { Connection } from './connection.js'
import { ExecutionContext } from './context.js'
import { ConnectionError, DatabaseMisuseError } from './errors.js'
import type { DatabaseAccess, TransactionCompletion } from './interface.js'
import { isThenable, runTransaction } from './transaction.js'

export interface OpenOptions extends Partial<DatabaseOptions> {
  /** Defaults to the process-wide logger. */
  logger?: Logger
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function validatePath(path: string): void {
  if (typeof path !== 'string' || path.length === 0) {
    throw new ConnectionError('INVALID_PATH', 'Database path must be a non-empty string')
  }
  if (path.includes('\0')) {
    throw new ConnectionError('INVALID_PATH', 'Database path must not contain NUL characters')
  }
}

/**
 * Serialized access to one database file.
 *
 * The queue exclusively owns its Connection and hands it only to blocks it
 * is running. Blocks are synchronous and run to completion, so with a
 * single JavaScript thread they execute strictly in call order; a block
 * that calls back into its own queue runs the inner block inline. Queues
 * never share state: two queues (in one thread or in separate workers)
 * proceed independently, the engine's file locking and busy timeout
 * arbitrating between them.
 *
 * Every block gets its own execution context. Cursors opened by a block
 * are closed when it ends and fail with DatabaseMisuseError afterwards.
 */
export class AccessQueue implements DatabaseAccess {
  readonly path: string
  private readonly connection: Connection
  private readonly logger: Logger
  private depth = 0
  private savepoints = 0
  private closed = false

  private constructor(path: string, connection: Connection, logger: Logger) {
    this.path = path
    this.connection = connection
    this.logger = logger
  }

  /**
   * Open (or create) the database at `path`. Use ':memory:' for a private
   * in-memory database.
   *
   * @throws ConnectionError when the options are invalid or the engine cannot open the file
   */
  static open(path: string, options: OpenOptions = {}): AccessQueue {
    const { logger: providedLogger, ...rest } = options
    const logger = (providedLogger ?? getDefaultLogger()).child({ component: 'access-queue' })
    validatePath(path)
    const resolved = resolveDatabaseOptions(rest)

    let native: Database.Database
    try {
      native = new Database(path, {
        readonly: resolved.readonly,
        fileMustExist: !resolved.create,
        timeout: resolved.timeoutMs,
        verbose: logger.isLevelEnabled('trace')
          ? (message?: unknown) => logger.trace({ sql: message }, 'sql')
          : undefined,
      })
    } catch (err) {
      throw new ConnectionError('CONNECTION_FAILED', `Cannot open database at ${path}: ${describeError(err)}`, {
        cause: err,
      })
    }

    try {
      if (!resolved.readonly) {
        native.pragma(`journal_mode = ${resolved.journalMode.toUpperCase()}`)
      }
      native.pragma(`foreign_keys = ${resolved.foreignKeys ? 'ON' : 'OFF'}`)
    } catch (err) {
      native.close()
      throw new ConnectionError('CONNECTION_FAILED', `Cannot configure database at ${path}: ${describeError(err)}`, {
        cause: err,
      })
    }

    logger.debug({ path, readonly: resolved.readonly }, 'database opened')
    return new AccessQueue(path, new Connection(native), logger)
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** True while one of this queue's blocks is running. */
  get isExecuting(): boolean {
    return this.depth > 0
  }

  inDatabase<T>(block: (db: Connection) => T): T {
    this.assertOpen()
    const context = new ExecutionContext()
    const previous = this.connection.enter(context)
    this.depth++
    try {
      const result = block(this.connection)
      if (isThenable(result)) {
        throw new DatabaseMisuseError('Database blocks must be synchronous; the block returned a promise')
      }
      return result
    } finally {
      this.depth--
      context.end()
      this.connection.enter(previous)
    }
  }

  inTransaction(
    block: (db: Connection) => TransactionCompletion,
    kind: TransactionKind = 'deferred',
  ): TransactionCompletion {
    return this.transaction(block, kind, (completion) => completion)
  }

  write<T>(block: (db: Connection) => T): T {
    return this.transaction(block, 'deferred', () => 'commit')
  }

  read<T>(block: (db: Connection) => T): T {
    return this.inDatabase((db) => {
      const wasQueryOnly = db.fetchOne('PRAGMA query_only')?.databaseValue(0)
      db.execute('PRAGMA query_only = ON')
      try {
        return this.inDatabase(block)
      } finally {
        if (wasQueryOnly?.kind !== 'integer' || wasQueryOnly.value === 0n) {
          db.execute('PRAGMA query_only = OFF')
        }
      }
    })
  }

  /**
   * Close the connection. Idempotent.
   *
   * @throws DatabaseMisuseError when called from inside one of this queue's blocks
   * @throws ConnectionError when the engine fails to close the handle
   */
  close(): void {
    if (this.closed) return
    if (this.depth > 0) {
      throw new DatabaseMisuseError('Cannot close a queue from inside one of its blocks')
    }
    this.closed = true
    try {
      this.connection.close()
    } catch (err) {
      this.logger.error({ err, path: this.path }, 'failed to close database')
      throw new ConnectionError('CONNECTION_FAILED', `Cannot close database at ${this.path}: ${describeError(err)}`, {
        cause: err,
      })
    }
    this.logger.debug({ path: this.path }, 'database closed')
  }

  private transaction<T>(
    block: (db: Connection) => T,
    kind: TransactionKind,
    complete: (result: T) => TransactionCompletion,
  ): T {
    return this.inDatabase((db) => {
      const savepointName = `rowkeeper_savepoint_${++this.savepoints}`
      // The inner block gets its own context so its cursors are closed before commit.
      return runTransaction(db, (inner) => this.inDatabase(() => block(inner)), {
        kind,
        savepointName,
        complete,
        logger: this.logger,
      })
    })
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ConnectionError('CLOSED', `Database at ${this.path} is closed`)
    }
  }
}
