import { BindingError } from './errors.js'

/**
 * One of the five storage classes the engine knows. Nothing else crosses
 * the boundary between application types and the database.
 */
export type DatabaseValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'integer'; readonly value: bigint }
  | { readonly kind: 'real'; readonly value: number }
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'blob'; readonly value: Uint8Array }

export type DatabaseValueKind = DatabaseValue['kind']

/** An application object that knows how to store itself. */
export interface DatabaseValueConvertible {
  toDatabaseValue(): DatabaseValue
}

/** Anything accepted as a statement argument. */
export type Bindable =
  | null
  | undefined
  | number
  | bigint
  | string
  | boolean
  | Date
  | Uint8Array
  | DatabaseValue
  | DatabaseValueConvertible

/** What better-sqlite3 accepts as a bound parameter. */
export type NativeValue = null | bigint | number | string | Buffer

export const NULL: DatabaseValue = Object.freeze({ kind: 'null' })

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

export function integer(value: bigint | number): DatabaseValue {
  const big = typeof value === 'bigint' ? value : BigInt(value)
  if (big < INT64_MIN || big > INT64_MAX) {
    throw new BindingError(`Integer ${big} does not fit in 64 bits`)
  }
  return { kind: 'integer', value: big }
}

export function real(value: number): DatabaseValue {
  return { kind: 'real', value }
}

export function text(value: string): DatabaseValue {
  return { kind: 'text', value }
}

export function blob(value: Uint8Array): DatabaseValue {
  return { kind: 'blob', value }
}

const VALUE_KINDS: ReadonlySet<string> = new Set(['null', 'integer', 'real', 'text', 'blob'])

export function isDatabaseValue(value: unknown): value is DatabaseValue {
  return (
    value !== null &&
    typeof value === 'object' &&
    'kind' in value &&
    typeof value.kind === 'string' &&
    VALUE_KINDS.has(value.kind)
  )
}

function isConvertible(value: object): value is DatabaseValueConvertible {
  return 'toDatabaseValue' in value && typeof value.toDatabaseValue === 'function'
}

/**
 * Format a date the way SQLite's date functions read it:
 * `YYYY-MM-DD HH:MM:SS.SSS`, UTC.
 */
export function formatDate(date: Date): string {
  return date.toISOString().replace('T', ' ').replace('Z', '')
}

/**
 * Convert an argument to its storage value.
 *
 * Safe integral numbers store as INTEGER, other numbers as REAL. Booleans store
 * as 0/1, dates as UTC text.
 *
 * @throws BindingError when the argument has no storage representation
 */
export function toDatabaseValue(value: Bindable): DatabaseValue {
  if (value === null || value === undefined) return NULL
  if (typeof value === 'number') {
    // SQLite stores NaN as NULL
    if (Number.isNaN(value)) throw new BindingError('Cannot bind NaN')
    return Number.isSafeInteger(value) ? integer(value) : real(value)
  }
  if (typeof value === 'bigint') return integer(value)
  if (typeof value === 'string') return text(value)
  if (typeof value === 'boolean') return integer(value ? 1n : 0n)
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new BindingError('Cannot bind an invalid Date')
    }
    return text(formatDate(value))
  }
  if (value instanceof Uint8Array) return blob(value)
  if (isDatabaseValue(value)) return value
  if (typeof value === 'object' && isConvertible(value)) {
    const converted: unknown = value.toDatabaseValue()
    if (isDatabaseValue(converted)) return converted
    throw new BindingError('toDatabaseValue() did not return a database value')
  }
  throw new BindingError(`Cannot bind a value of type ${typeof value}`)
}

export function toNativeValue(value: DatabaseValue): NativeValue {
  switch (value.kind) {
    case 'null':
      return null
    case 'integer':
    case 'real':
    case 'text':
      return value.value
    case 'blob':
      return Buffer.isBuffer(value.value)
        ? value.value
        : Buffer.from(value.value.buffer, value.value.byteOffset, value.value.byteLength)
  }
}

/**
 * Wrap a value read from the driver. Statements run with safe integers, so
 * INTEGER storage arrives as bigint and REAL storage as number.
 */
export function fromNativeValue(value: unknown): DatabaseValue {
  if (value === null || value === undefined) return NULL
  if (typeof value === 'bigint') return integer(value)
  if (typeof value === 'number') return real(value)
  if (typeof value === 'string') return text(value)
  if (value instanceof Uint8Array) return blob(value)
  throw new TypeError(`Unexpected value returned by the engine: ${typeof value}`)
}

/** Structural equality over storage values. */
export function databaseValuesEqual(a: DatabaseValue, b: DatabaseValue): boolean {
  switch (a.kind) {
    case 'null':
      return b.kind === 'null'
    case 'integer':
      return b.kind === 'integer' && a.value === b.value
    case 'real':
      return b.kind === 'real' && (a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value)))
    case 'text':
      return b.kind === 'text' && a.value === b.value
    case 'blob':
      return b.kind === 'blob' && Buffer.compare(a.value, b.value) === 0
  }
}

/** Short human-readable rendering used in error messages and CLI output. */
export function describeDatabaseValue(value: DatabaseValue): string {
  switch (value.kind) {
    case 'null':
      return 'NULL'
    case 'integer':
      return value.value.toString()
    case 'real':
      return String(value.value)
    case 'text':
      return JSON.stringify(value.value)
    case 'blob':
      return `<${value.value.byteLength} bytes>`
  }
}
