import type { ExecutionContext, ScopedResource } from './context.js'
import { DatabaseMisuseError, toExecutionError } from './errors.js'
import { Row } from './row.js'
import { fromNativeValue } from './value.js'

/**
 * Steps one native iterator and turns raw arrays into Rows. Shared by a
 * cursor and every cursor mapped from it.
 */
export class RowSource implements ScopedResource {
  private closed = false

  constructor(
    private readonly iterator: Iterator<unknown>,
    private readonly columnNames: readonly string[],
    private readonly sql: string,
    private readonly onClose: () => void,
  ) {}

  get isClosed(): boolean {
    return this.closed
  }

  next(): Row | undefined {
    if (this.closed) return undefined
    let step: IteratorResult<unknown>
    try {
      step = this.iterator.next()
    } catch (err) {
      this.close()
      throw toExecutionError(err, this.sql)
    }
    if (step.done) {
      this.close()
      return undefined
    }
    return toRow(this.columnNames, step.value)
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    this.iterator.return?.()
    this.onClose()
  }
}

export function toRow(columnNames: readonly string[], raw: unknown): Row {
  if (!Array.isArray(raw)) {
    throw new TypeError('Expected the engine to return a raw row array')
  }
  return new Row(columnNames, raw.map(fromNativeValue))
}

/**
 * Lazy, forward-only sequence of query results. Rows are stepped from the
 * engine as they are consumed.
 *
 * A cursor belongs to the block that created it: stepping it after that
 * block returned throws DatabaseMisuseError, exhausted or not.
 */
export class Cursor<T> implements IterableIterator<T> {
  constructor(
    private readonly context: ExecutionContext,
    private readonly source: RowSource,
    private readonly transform: (row: Row) => T,
  ) {}

  next(): IteratorResult<T, undefined> {
    if (!this.context.isActive) {
      throw new DatabaseMisuseError('Cursor consumed outside of the block that created it')
    }
    const row = this.source.next()
    if (row === undefined) return { done: true, value: undefined }
    return { done: false, value: this.transform(row) }
  }

  /** Invoked by `for...of` on early exit. */
  return(): IteratorResult<T, undefined> {
    this.source.close()
    return { done: true, value: undefined }
  }

  [Symbol.iterator](): this {
    return this
  }

  close(): void {
    this.source.close()
  }

  /** A cursor over the same rows with every element passed through `transform`. */
  map<U>(transform: (value: T) => U): Cursor<U> {
    return new Cursor(this.context, this.source, (row) => transform(this.transform(row)))
  }

  /** Drain the remaining elements. */
  toArray(): T[] {
    const result: T[] = []
    for (let step = this.next(); !step.done; step = this.next()) {
      result.push(step.value)
    }
    return result
  }
}
