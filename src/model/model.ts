import type { Bindings } from '../database/bindings.js'
import type { Connection } from '../database/connection.js'
import { Converters } from '../database/converters.js'
import type { Cursor } from '../database/cursor.js'
import {
  BindingError,
  PersistenceError,
  UnsupportedOperationError,
} from '../database/errors.js'
import { required, type Row, type RowExtractor } from '../database/row.js'
import type { ExecuteResult } from '../database/statement.js'
import {
  isDatabaseValue,
  type Bindable,
  type DatabaseValueConvertible,
} from '../database/value.js'
import { isHiddenRowid, keyColumns, type PrimaryKey } from './primary-key.js'
import { equalityPredicate, quoteIdentifier } from './sql.js'

/** Column name to value, as written by insert and update. */
export type ColumnValues = Readonly<Record<string, Bindable>>

/**
 * A key for fetch-by-key. Single and row id keys take one value; composite
 * keys take either the values in declared order or a column-keyed object.
 */
export type KeyValue = Bindable | readonly Bindable[] | Readonly<Record<string, Bindable>>

/**
 * The persistence contract of an entity type: these four pieces (plus the
 * optional insert hook) are all a Model needs.
 */
export interface ModelDefinition<T> {
  tableName: string
  primaryKey: PrimaryKey
  /**
   * Build a record from a row. Columns the row lacks must be left unset,
   * not reported: partial-column queries populate records too.
   */
  fromRow(row: Row): T
  /** Values to write, keyed by column name. */
  toColumns(record: T): ColumnValues
  /** Receives the engine-assigned row id after each successful insert. Row id keys only. */
  didInsert?(record: T, rowId: bigint): void
}

function isUnset(value: Bindable): boolean {
  return value === null || value === undefined || (isDatabaseValue(value) && value.kind === 'null')
}

function isConvertible(value: object): value is DatabaseValueConvertible {
  return 'toDatabaseValue' in value && typeof value.toDatabaseValue === 'function'
}

/** Single values are anything that binds on its own; arrays and plain records are not. */
function isSingleKey(key: KeyValue): key is Bindable {
  if (key === null || typeof key !== 'object') return true
  if (Array.isArray(key)) return false
  return key instanceof Date || key instanceof Uint8Array || isDatabaseValue(key) || isConvertible(key)
}

function isKeyArray(key: KeyValue): key is readonly Bindable[] {
  return Array.isArray(key)
}

/**
 * CRUD for one entity type, built from Connection and Statement
 * primitives. A Model is also a RowExtractor, so it can be passed to the
 * typed fetch methods with any SQL whose columns it understands.
 *
 * Primary key dispatch is an exhaustive switch over the PrimaryKey union.
 */
export class Model<T> implements RowExtractor<T> {
  readonly tableName: string
  readonly primaryKey: PrimaryKey
  private readonly definition: ModelDefinition<T>

  constructor(definition: ModelDefinition<T>) {
    if (definition.primaryKey.kind === 'composite' && definition.primaryKey.columns.length === 0) {
      throw new PersistenceError('A composite primary key needs at least one column')
    }
    this.definition = definition
    this.tableName = definition.tableName
    this.primaryKey = definition.primaryKey
  }

  extract(row: Row): T {
    return this.definition.fromRow(row)
  }

  /**
   * Insert the record. With a row id key the generated id is handed to
   * `didInsert` so it lands in the record.
   *
   * @throws UnsupportedOperationError without a primary key
   * @throws PersistenceError without a table name or write mapping
   */
  insert(db: Connection, record: T): ExecuteResult {
    this.requireKey('insert')
    const table = this.requireTable()
    let entries = this.writeEntries(record)
    if (this.primaryKey.kind === 'rowid') {
      // A missing row id is generated by the engine.
      const column = this.primaryKey.column
      entries = entries.filter(([name, value]) => name !== column || !isUnset(value))
    }

    const sql =
      entries.length === 0
        ? `INSERT INTO ${table} DEFAULT VALUES`
        : `INSERT INTO ${table} (${entries.map(([name]) => quoteIdentifier(name)).join(', ')}) VALUES (${entries
            .map(() => '?')
            .join(', ')})`
    const result = db.execute(
      sql,
      entries.map(([, value]) => value),
    )
    // lastInsertRowid is stale for WITHOUT ROWID tables
    if (this.primaryKey.kind === 'rowid') {
      this.definition.didInsert?.(record, result.lastInsertRowid)
    }
    return result
  }

  /**
   * Update every non-key column of the row the record's key identifies.
   *
   * @returns the number of rows changed; 0 when no row has this key
   * @throws UnsupportedOperationError without a primary key, or with an unset key
   */
  update(db: Connection, record: T): number {
    const columns = this.requireKey('update')
    const table = this.requireTable()
    const entries = this.writeEntries(record)
    const keyValues = this.keyValuesOf(entries, columns, 'update')

    let assignments = entries.filter(([name]) => !columns.includes(name))
    if (assignments.length === 0) {
      // Only key columns: touch the row without changing it.
      assignments = entries.filter(([name]) => columns.includes(name))
    }
    const sql = `UPDATE ${table} SET ${assignments
      .map(([name]) => `${quoteIdentifier(name)} = ?`)
      .join(', ')} WHERE ${equalityPredicate(columns)}`
    return db.execute(sql, [...assignments.map(([, value]) => value), ...keyValues]).changes
  }

  /**
   * Update the record, or insert it when its key is unset or matches no
   * row.
   */
  save(db: Connection, record: T): void {
    const columns = this.requireKey('save')
    const entries = this.writeEntries(record)
    const keyIsSet = columns.every((column) => entries.some(([name, value]) => name === column && !isUnset(value)))
    if (keyIsSet && this.update(db, record) > 0) return
    this.insert(db, record)
  }

  /**
   * Delete the row the record's key identifies.
   *
   * @returns whether a row was deleted
   * @throws UnsupportedOperationError without a primary key, or with an unset key
   */
  delete(db: Connection, record: T): boolean {
    const columns = this.requireKey('delete')
    const table = this.requireTable()
    const keyValues = this.keyValuesOf(this.writeEntries(record), columns, 'delete')
    return db.execute(`DELETE FROM ${table} WHERE ${equalityPredicate(columns)}`, keyValues).changes > 0
  }

  /** Whether a row with the record's key exists. */
  exists(db: Connection, record: T): boolean {
    const columns = this.requireKey('exists')
    const table = this.requireTable()
    const keyValues = this.keyValuesOf(this.writeEntries(record), columns, 'exists')
    return db.fetchOne(`SELECT 1 FROM ${table} WHERE ${equalityPredicate(columns)}`, keyValues) !== null
  }

  /**
   * Fetch the record with the given key, or null. A null key matches
   * nothing and runs no query.
   *
   * @throws UnsupportedOperationError without a primary key
   * @throws BindingError when a composite key is incomplete
   */
  fetchOne(db: Connection, key: KeyValue): T | null {
    const columns = this.requireKey('fetch by key')
    if (key === null || key === undefined) return null
    const table = this.requireTable()
    const bindings = this.keyBindings(key, columns)
    return db.fetchOne(this, `SELECT ${this.selection()} FROM ${table} WHERE ${equalityPredicate(columns)}`, bindings)
  }

  fetchAll(db: Connection): T[] {
    return db.fetchAll(this, `SELECT ${this.selection()} FROM ${this.requireTable()}`)
  }

  /** Lazy variant of fetchAll; bound to the calling block like every cursor. */
  fetch(db: Connection): Cursor<T> {
    return db.fetch(this, `SELECT ${this.selection()} FROM ${this.requireTable()}`)
  }

  fetchCount(db: Connection): number {
    return db.fetchOne(required(Converters.integer), `SELECT COUNT(*) FROM ${this.requireTable()}`) ?? 0
  }

  /** Delete the row with the given key. */
  deleteOne(db: Connection, key: KeyValue): boolean {
    const columns = this.requireKey('delete')
    if (key === null || key === undefined) return false
    const table = this.requireTable()
    const bindings = this.keyBindings(key, columns)
    return db.execute(`DELETE FROM ${table} WHERE ${equalityPredicate(columns)}`, bindings).changes > 0
  }

  /** Delete every row of the table. Returns the number deleted. */
  deleteAll(db: Connection): number {
    return db.execute(`DELETE FROM ${this.requireTable()}`).changes
  }

  private selection(): string {
    return isHiddenRowid(this.primaryKey) ? `*, ${quoteIdentifier(keyColumns(this.primaryKey)[0])}` : '*'
  }

  private requireKey(operation: string): readonly string[] {
    switch (this.primaryKey.kind) {
      case 'none':
        throw new UnsupportedOperationError(`Cannot ${operation} ${this.tableName || 'record'}: the model declares no primary key`)
      case 'rowid':
      case 'single':
      case 'composite':
        return keyColumns(this.primaryKey)
    }
  }

  private requireTable(): string {
    if (typeof this.tableName !== 'string' || this.tableName.length === 0) {
      throw new PersistenceError('The model declares no table name')
    }
    return quoteIdentifier(this.tableName)
  }

  private writeEntries(record: T): Array<[string, Bindable]> {
    const entries = Object.entries(this.definition.toColumns(record))
    if (entries.length === 0) {
      throw new PersistenceError(`The write mapping of ${this.tableName} is empty`)
    }
    return entries
  }

  private keyValuesOf(
    entries: Array<[string, Bindable]>,
    columns: readonly string[],
    operation: string,
  ): Bindable[] {
    return columns.map((column) => {
      const entry = entries.find(([name]) => name === column)
      if (!entry || isUnset(entry[1])) {
        throw new UnsupportedOperationError(
          `Cannot ${operation} ${this.tableName}: primary key column "${column}" is not set`,
        )
      }
      return entry[1]
    })
  }

  private keyBindings(key: KeyValue, columns: readonly string[]): Bindings {
    if (this.primaryKey.kind !== 'composite') {
      if (!isSingleKey(key)) {
        throw new BindingError(`${this.tableName} has a single-column key; got a composite value`)
      }
      return [key]
    }
    if (isSingleKey(key)) {
      throw new BindingError(`${this.tableName} has a composite key of ${columns.length} columns; got a single value`)
    }
    if (isKeyArray(key)) {
      if (key.length !== columns.length) {
        throw new BindingError(`${this.tableName} key needs ${columns.length} values, got ${key.length}`)
      }
      return key
    }
    return columns.map((column) => {
      if (!Object.prototype.hasOwnProperty.call(key, column)) {
        throw new BindingError(`${this.tableName} key is missing column "${column}"`)
      }
      return key[column]
    })
  }
}

/** Declare an entity type. */
export function defineModel<T>(definition: ModelDefinition<T>): Model<T> {
  return new Model(definition)
}
