import type { ValueConverter } from './converters.js'
import { TypeMismatchError } from './errors.js'
import { describeDatabaseValue, type DatabaseValue } from './value.js'

/** Column position (0-based) or exact, case-sensitive column name. */
export type ColumnRef = number | string

/**
 * Immutable snapshot of one fetched record.
 *
 * Names are matched exactly as the engine returned them. When a query
 * yields the same name twice, lookups by name resolve to the first.
 */
export class Row {
  readonly columnNames: readonly string[]
  readonly values: readonly DatabaseValue[]
  private readonly indexByName = new Map<string, number>()

  constructor(columnNames: readonly string[], values: readonly DatabaseValue[]) {
    if (columnNames.length !== values.length) {
      throw new RangeError(`Row has ${columnNames.length} columns but ${values.length} values`)
    }
    this.columnNames = Object.freeze([...columnNames])
    this.values = Object.freeze([...values])
    this.columnNames.forEach((name, index) => {
      if (!this.indexByName.has(name)) this.indexByName.set(name, index)
    })
  }

  get count(): number {
    return this.values.length
  }

  hasColumn(name: string): boolean {
    return this.indexByName.has(name)
  }

  indexOf(column: ColumnRef): number | undefined {
    if (typeof column === 'number') {
      return Number.isInteger(column) && column >= 0 && column < this.values.length ? column : undefined
    }
    return this.indexByName.get(column)
  }

  /** The stored value, or undefined when the column does not exist. */
  databaseValue(column: ColumnRef): DatabaseValue | undefined {
    const index = this.indexOf(column)
    return index === undefined ? undefined : this.values[index]
  }

  /**
   * Convert a column. Missing columns, NULL and incompatible kinds all read
   * as undefined.
   */
  decode<T>(converter: ValueConverter<T>, column: ColumnRef): T | undefined {
    const value = this.databaseValue(column)
    return value === undefined ? undefined : converter.fromDatabaseValue(value)
  }

  /**
   * Convert a column whose value must be present.
   *
   * @throws TypeMismatchError when the column is missing or does not convert
   */
  require<T>(converter: ValueConverter<T>, column: ColumnRef): T {
    const value = this.databaseValue(column)
    if (value === undefined) {
      throw new TypeMismatchError('MISSING_COLUMN', column, `No such column: ${String(column)}`)
    }
    const converted = converter.fromDatabaseValue(value)
    if (converted === undefined) {
      throw new TypeMismatchError(
        'TYPE_MISMATCH',
        column,
        `Could not convert ${describeDatabaseValue(value)} to ${converter.name} at column ${String(column)}`,
      )
    }
    return converted
  }

  /** Name-keyed copy; the first occurrence of a duplicated name wins. */
  toObject(): Record<string, DatabaseValue> {
    const result: Record<string, DatabaseValue> = {}
    for (const [name, index] of this.indexByName) {
      result[name] = this.values[index]
    }
    return result
  }
}

/** Builds a value of type T out of a row. Models and projections are extractors. */
export interface RowExtractor<T> {
  extract(row: Row): T
}

/** What the typed fetch methods accept: a converter reads column 0. */
export type Extractable<T> = RowExtractor<T> | ValueConverter<T>

/** Non-optional target: a mismatch raises TypeMismatchError. */
export function required<T>(converter: ValueConverter<T>, column: ColumnRef = 0): RowExtractor<T> {
  return { extract: (row) => row.require(converter, column) }
}

/** Optional target: NULL, a mismatch or a missing column read as null. */
export function optional<T>(converter: ValueConverter<T>, column: ColumnRef = 0): RowExtractor<T | null> {
  return { extract: (row) => row.decode(converter, column) ?? null }
}

export function toExtractor<T>(target: Extractable<T>): RowExtractor<T> {
  if ('extract' in target) return target
  return required(target, 0)
}
