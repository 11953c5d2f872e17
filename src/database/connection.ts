import type Database from 'better-sqlite3'
import type { Bindings } from './bindings.js'
import { assertActive, type ContextProvider, type ExecutionContext } from './context.js'
import type { Cursor } from './cursor.js'
import { toExecutionError } from './errors.js'
import { toExtractor, type Extractable, type Row, type RowExtractor } from './row.js'
import { Statement, type ExecuteResult } from './statement.js'

interface ResolvedQuery<T> {
  sql: string
  bindings: Bindings | undefined
  extractor: RowExtractor<T> | undefined
}

function resolveQuery<T>(
  first: string | Extractable<T>,
  second: string | Bindings | undefined,
  third: Bindings | undefined,
): ResolvedQuery<T> {
  if (typeof first === 'string') {
    if (typeof second === 'string') {
      throw new TypeError('Bindings must be an array or an object, not a string')
    }
    return { sql: first, bindings: second, extractor: undefined }
  }
  if (typeof second !== 'string') {
    throw new TypeError('Expected SQL text after the extraction target')
  }
  return { sql: second, bindings: third, extractor: toExtractor(first) }
}

/**
 * The single handle to one database file. Only reachable from inside the
 * blocks of the AccessQueue that owns it.
 *
 * Compiled statements are cached by exact SQL text, up to
 * STATEMENT_CACHE_SIZE of them, least recently used first out. The cache
 * pays off for SQL that takes its values as bindings; SQL with values
 * spliced into the text should go through `prepare`. A cached statement
 * that is still being iterated is never handed out twice; a fresh one is
 * compiled instead.
 */
export const STATEMENT_CACHE_SIZE = 100

export class Connection implements ContextProvider {
  private readonly statements = new Map<string, Statement>()
  private context: ExecutionContext | null = null

  constructor(private readonly native: Database.Database) {}

  /**
   * Switch the running block. Returns the context it replaces.
   * @internal
   */
  enter(context: ExecutionContext | null): ExecutionContext | null {
    const previous = this.context
    this.context = context
    return previous
  }

  currentContext(): ExecutionContext {
    return assertActive(this.context, 'Database connection')
  }

  get isInsideTransaction(): boolean {
    this.currentContext()
    return this.native.inTransaction
  }

  get isReadOnly(): boolean {
    return this.native.readonly
  }

  /** Compile a statement the caller owns, e.g. for batch inserts. */
  prepare(sql: string): Statement {
    this.currentContext()
    try {
      return new Statement(this, this.native.prepare(sql))
    } catch (err) {
      throw toExecutionError(err, sql)
    }
  }

  cachedStatement(sql: string): Statement {
    const cached = this.statements.get(sql)
    if (cached && !cached.isIterating && !cached.isReleased) {
      this.remember(sql, cached)
      return cached
    }
    const statement = this.prepare(sql)
    if (!cached || cached.isReleased) this.remember(sql, statement)
    return statement
  }

  get cachedStatementCount(): number {
    return this.statements.size
  }

  private remember(sql: string, statement: Statement): void {
    // Map order is insertion order: re-inserting marks the entry as recent
    this.statements.delete(sql)
    this.statements.set(sql, statement)
    for (const oldest of this.statements.keys()) {
      if (this.statements.size <= STATEMENT_CACHE_SIZE) break
      // Dropped, not released: an open cursor or the caller may still hold it
      this.statements.delete(oldest)
    }
  }

  execute(sql: string, bindings?: Bindings): ExecuteResult {
    return this.cachedStatement(sql).execute(bindings)
  }

  /** Run several semicolon-separated statements. Takes no bindings. */
  executeScript(sql: string): void {
    this.currentContext()
    try {
      this.native.exec(sql)
    } catch (err) {
      throw toExecutionError(err, sql)
    }
  }

  fetch(sql: string, bindings?: Bindings): Cursor<Row>
  fetch<T>(target: Extractable<T>, sql: string, bindings?: Bindings): Cursor<T>
  fetch<T>(first: string | Extractable<T>, second?: string | Bindings, third?: Bindings): Cursor<Row> | Cursor<T> {
    const query = resolveQuery(first, second, third)
    const cursor = this.cachedStatement(query.sql).fetch(query.bindings)
    const extractor = query.extractor
    return extractor ? cursor.map((row) => extractor.extract(row)) : cursor
  }

  fetchAll(sql: string, bindings?: Bindings): Row[]
  fetchAll<T>(target: Extractable<T>, sql: string, bindings?: Bindings): T[]
  fetchAll<T>(first: string | Extractable<T>, second?: string | Bindings, third?: Bindings): Row[] | T[] {
    const query = resolveQuery(first, second, third)
    const rows = this.cachedStatement(query.sql).fetchAll(query.bindings)
    const extractor = query.extractor
    return extractor ? rows.map((row) => extractor.extract(row)) : rows
  }

  fetchOne(sql: string, bindings?: Bindings): Row | null
  fetchOne<T>(target: Extractable<T>, sql: string, bindings?: Bindings): T | null
  fetchOne<T>(first: string | Extractable<T>, second?: string | Bindings, third?: Bindings): Row | T | null {
    const query = resolveQuery(first, second, third)
    const row = this.cachedStatement(query.sql).fetchOne(query.bindings)
    if (row === null) return null
    return query.extractor ? query.extractor.extract(row) : row
  }

  /** Number of rows changed by the most recent write on this connection. */
  get changes(): number {
    const row = this.fetchOne('SELECT changes()')
    const value = row?.databaseValue(0)
    return value?.kind === 'integer' ? Number(value.value) : 0
  }

  get lastInsertRowid(): bigint {
    const value = this.fetchOne('SELECT last_insert_rowid()')?.databaseValue(0)
    return value?.kind === 'integer' ? value.value : 0n
  }

  /**
   * Release every cached statement and close the native handle.
   * Called by the owning queue on teardown.
   */
  close(): void {
    for (const statement of this.statements.values()) {
      statement.release()
    }
    this.statements.clear()
    this.native.close()
  }
}
