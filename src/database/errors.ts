/** Typed database error codes for downstream error handling */
export type DatabaseErrorCode =
  | 'CONNECTION_FAILED'
  | 'INVALID_OPTIONS'
  | 'INVALID_PATH'
  | 'CLOSED'
  | 'EXECUTION_FAILED'
  | 'BINDING_FAILED'
  | 'TYPE_MISMATCH'
  | 'MISSING_COLUMN'
  | 'UNSUPPORTED_OPERATION'
  | 'PERSISTENCE_FAILED'
  | 'MIGRATION_FAILED'
  | 'MISUSE'

/** Base class of every error raised by the access layer. */
export class DatabaseError extends Error {
  readonly code: DatabaseErrorCode

  constructor(code: DatabaseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DatabaseError'
    this.code = code
  }
}

/** The database file could not be opened, created or closed. */
export class ConnectionError extends DatabaseError {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(
    code: 'CONNECTION_FAILED' | 'INVALID_OPTIONS' | 'INVALID_PATH' | 'CLOSED',
    message: string,
    options: { cause?: unknown; fields?: Array<{ path: string; message: string }> } = {},
  ) {
    super(code, message, { cause: options.cause })
    this.name = 'ConnectionError'
    this.fields = options.fields ?? []
  }
}

/**
 * SQL failed inside the engine: syntax, constraint violation, busy
 * database, write attempted in a read-only block.
 */
export class ExecutionError extends DatabaseError {
  /** Native engine code, e.g. `SQLITE_CONSTRAINT_UNIQUE`. */
  readonly engineCode: string
  readonly sql: string | undefined

  constructor(message: string, engineCode: string, sql?: string, options?: { cause?: unknown }) {
    super('EXECUTION_FAILED', message, options)
    this.name = 'ExecutionError'
    this.engineCode = engineCode
    this.sql = sql
  }
}

/** Arguments do not match the placeholders of a statement. Raised before any step. */
export class BindingError extends DatabaseError {
  readonly sql: string | undefined

  constructor(message: string, sql?: string, options?: { cause?: unknown }) {
    super('BINDING_FAILED', message, options)
    this.name = 'BindingError'
    this.sql = sql
  }
}

/** A non-optional extraction met a value (or a missing column) it cannot convert. */
export class TypeMismatchError extends DatabaseError {
  readonly column: number | string

  constructor(code: 'TYPE_MISMATCH' | 'MISSING_COLUMN', column: number | string, message: string) {
    super(code, message)
    this.name = 'TypeMismatchError'
    this.column = column
  }
}

/** A model operation its primary key declaration (or its unset key) does not allow. */
export class UnsupportedOperationError extends DatabaseError {
  constructor(message: string) {
    super('UNSUPPORTED_OPERATION', message)
    this.name = 'UnsupportedOperationError'
  }
}

/** A model lacks the table name or write mapping a persistence method needs. */
export class PersistenceError extends DatabaseError {
  constructor(message: string) {
    super('PERSISTENCE_FAILED', message)
    this.name = 'PersistenceError'
  }
}

/** A registered migration failed; its transaction has been rolled back. */
export class MigrationError extends DatabaseError {
  readonly migration: string

  constructor(migration: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super('MIGRATION_FAILED', `Migration "${migration}" failed: ${reason}`, { cause })
    this.name = 'MigrationError'
    this.migration = migration
  }
}

/**
 * Programmer misuse: a cursor, connection or statement used outside the
 * block that owns it, an asynchronous block, closing a queue from inside
 * one of its blocks. Not meant to be caught and retried.
 */
export class DatabaseMisuseError extends DatabaseError {
  readonly fatal = true

  constructor(message: string) {
    super('MISUSE', message)
    this.name = 'DatabaseMisuseError'
  }
}

interface EngineErrorLike {
  message: string
  code: string
}

/** True for errors raised by the SQLite driver itself (`SqliteError`). */
export function isEngineError(err: unknown): err is Error & EngineErrorLike {
  return (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('SQLITE_')
  )
}

/**
 * Translate an error thrown by the driver while compiling or stepping a
 * statement. Errors that are already ours pass through.
 */
export function toExecutionError(err: unknown, sql?: string): Error {
  if (err instanceof DatabaseError) return err
  if (isEngineError(err)) {
    return new ExecutionError(err.message, err.code, sql, { cause: err })
  }
  if (err instanceof Error) {
    return new ExecutionError(err.message, 'SQLITE_MISUSE', sql, { cause: err })
  }
  return new ExecutionError(String(err), 'SQLITE_ERROR', sql)
}

/**
 * Translate an error thrown by the driver while binding and stepping.
 * The driver reports placeholder count and name mismatches as RangeError
 * before the first step.
 */
export function toStepError(err: unknown, sql?: string): Error {
  if (err instanceof RangeError) {
    return new BindingError(err.message, sql, { cause: err })
  }
  return toExecutionError(err, sql)
}
