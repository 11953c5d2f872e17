import type Database from 'better-sqlite3'
import { toNativeArguments, type Bindings } from './bindings.js'
import type { ContextProvider } from './context.js'
import { Cursor, RowSource, toRow } from './cursor.js'
import { DatabaseMisuseError, ExecutionError, toStepError } from './errors.js'
import type { Row } from './row.js'

/** Result of a write. */
export interface ExecuteResult {
  /** Rows inserted, updated or deleted by this statement. */
  changes: number
  /** Row id of the most recent successful INSERT on the connection. */
  lastInsertRowid: bigint
}

/**
 * A compiled SQL statement owned by one connection. Rebindable and
 * re-executable; every run takes a fresh set of bindings.
 */
export class Statement {
  readonly sql: string
  private readonly native: Database.Statement
  private readonly owner: ContextProvider
  private iterating = false
  private released = false

  constructor(owner: ContextProvider, native: Database.Statement) {
    this.owner = owner
    this.native = native
    this.sql = native.source
    this.native.safeIntegers(true)
    if (this.native.reader) {
      this.native.raw(true)
    }
  }

  /** True for statements that return rows. */
  get isReader(): boolean {
    return this.native.reader
  }

  /** True while a cursor opened on this statement has not finished. */
  get isIterating(): boolean {
    return this.iterating
  }

  get isReleased(): boolean {
    return this.released
  }

  get columnNames(): string[] {
    if (!this.native.reader) return []
    return this.native.columns().map((column) => column.name)
  }

  /**
   * Bind, step to completion and report the effect. Rows a query would
   * return are discarded.
   */
  execute(bindings?: Bindings): ExecuteResult {
    this.prepareRun()
    const args = toNativeArguments(bindings, this.sql)
    try {
      const result = this.native.run(...args)
      return { changes: result.changes, lastInsertRowid: BigInt(result.lastInsertRowid) }
    } catch (err) {
      throw toStepError(err, this.sql)
    }
  }

  /**
   * Open a lazy cursor. Binding happens now, so argument mismatches throw
   * here and not on the first step.
   */
  fetch(bindings?: Bindings): Cursor<Row> {
    const context = this.prepareRun()
    this.assertReader()
    const args = toNativeArguments(bindings, this.sql)
    const columnNames = this.columnNames
    let iterator: Iterator<unknown>
    try {
      iterator = this.native.iterate(...args)
    } catch (err) {
      throw toStepError(err, this.sql)
    }
    this.iterating = true
    const source = new RowSource(iterator, columnNames, this.sql, () => {
      this.iterating = false
      context.untrack(source)
    })
    context.track(source)
    return new Cursor(context, source, (row) => row)
  }

  fetchAll(bindings?: Bindings): Row[] {
    this.prepareRun()
    this.assertReader()
    const args = toNativeArguments(bindings, this.sql)
    const columnNames = this.columnNames
    let rows: unknown[]
    try {
      rows = this.native.all(...args)
    } catch (err) {
      throw toStepError(err, this.sql)
    }
    return rows.map((raw) => toRow(columnNames, raw))
  }

  /** First row, or null. The remaining rows are never stepped. */
  fetchOne(bindings?: Bindings): Row | null {
    this.prepareRun()
    this.assertReader()
    const args = toNativeArguments(bindings, this.sql)
    const columnNames = this.columnNames
    let raw: unknown
    try {
      raw = this.native.get(...args)
    } catch (err) {
      throw toStepError(err, this.sql)
    }
    return raw === undefined ? null : toRow(columnNames, raw)
  }

  /** Drop the statement. Using it afterwards is a usage error. */
  release(): void {
    this.released = true
  }

  private prepareRun() {
    const context = this.owner.currentContext()
    if (this.released) {
      throw new DatabaseMisuseError(`Statement used after release: ${this.sql}`)
    }
    if (this.iterating) {
      throw new DatabaseMisuseError(`Statement is still being iterated by an open cursor: ${this.sql}`)
    }
    return context
  }

  private assertReader(): void {
    if (!this.native.reader) {
      throw new ExecutionError(
        'Statement does not return rows; use execute() instead',
        'SQLITE_MISUSE',
        this.sql,
      )
    }
  }
}
