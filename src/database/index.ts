export { AccessQueue } from './access-queue.js'
export type { OpenOptions } from './access-queue.js'
export type { DatabaseAccess, TransactionCompletion } from './interface.js'
export { Connection } from './connection.js'
export { Statement } from './statement.js'
export type { ExecuteResult } from './statement.js'
export { Cursor } from './cursor.js'
export { Row, required, optional, toExtractor } from './row.js'
export type { ColumnRef, Extractable, RowExtractor } from './row.js'
export type { Bindings } from './bindings.js'
export { Converters, parseDate } from './converters.js'
export type { ValueConverter } from './converters.js'
export {
  NULL,
  integer,
  real,
  text,
  blob,
  isDatabaseValue,
  toDatabaseValue,
  databaseValuesEqual,
  describeDatabaseValue,
  formatDate,
} from './value.js'
export type { DatabaseValue, DatabaseValueKind, DatabaseValueConvertible, Bindable } from './value.js'
export {
  DatabaseError,
  ConnectionError,
  ExecutionError,
  BindingError,
  TypeMismatchError,
  UnsupportedOperationError,
  PersistenceError,
  MigrationError,
  DatabaseMisuseError,
} from './errors.js'
export type { DatabaseErrorCode } from './errors.js'
