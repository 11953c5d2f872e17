import type { Static, TSchema } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { BindingError } from './errors.js'
import { formatDate, integer, real, text, blob, type DatabaseValue } from './value.js'

/**
 * Two-way conversion between an application type and a storage value.
 *
 * `fromDatabaseValue` returns undefined, never throws, when the stored kind
 * is incompatible (NULL included). Whether absence is acceptable is the
 * caller's decision: see `required` and `optional` in row.ts.
 */
export interface ValueConverter<T> {
  /** Used in error messages. */
  readonly name: string
  toDatabaseValue(value: T): DatabaseValue
  fromDatabaseValue(value: DatabaseValue): T | undefined
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER)
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

/** Integers that fit a JS number exactly. Larger stored integers read as absent. */
const integerConverter: ValueConverter<number> = {
  name: 'integer',
  toDatabaseValue(value) {
    if (!Number.isSafeInteger(value)) {
      throw new BindingError(`${value} is not a safe integer`)
    }
    return integer(value)
  },
  fromDatabaseValue(value) {
    if (value.kind === 'integer') {
      return value.value >= MIN_SAFE && value.value <= MAX_SAFE ? Number(value.value) : undefined
    }
    if (value.kind === 'real' && Number.isSafeInteger(value.value)) return value.value
    return undefined
  },
}

const bigintConverter: ValueConverter<bigint> = {
  name: 'bigint',
  toDatabaseValue: (value) => integer(value),
  fromDatabaseValue(value) {
    if (value.kind === 'integer') return value.value
    if (value.kind === 'real' && Number.isSafeInteger(value.value)) return BigInt(value.value)
    return undefined
  },
}

/** Doubles. Integers above 2^53 lose precision on the way out. */
const realConverter: ValueConverter<number> = {
  name: 'real',
  toDatabaseValue(value) {
    if (Number.isNaN(value)) {
      throw new BindingError('Cannot bind NaN')
    }
    return real(value)
  },
  fromDatabaseValue(value) {
    if (value.kind === 'real') return value.value
    if (value.kind === 'integer') return Number(value.value)
    return undefined
  },
}

const textConverter: ValueConverter<string> = {
  name: 'text',
  toDatabaseValue: (value) => text(value),
  fromDatabaseValue: (value) => (value.kind === 'text' ? value.value : undefined),
}

const booleanConverter: ValueConverter<boolean> = {
  name: 'boolean',
  toDatabaseValue: (value) => integer(value ? 1n : 0n),
  fromDatabaseValue(value) {
    if (value.kind === 'integer') return value.value !== 0n
    if (value.kind === 'real') return value.value !== 0
    return undefined
  },
}

/** Bytes. Text reads as its UTF-8 encoding. */
const blobConverter: ValueConverter<Uint8Array> = {
  name: 'blob',
  toDatabaseValue: (value) => blob(value),
  fromDatabaseValue(value) {
    if (value.kind === 'blob') return value.value
    if (value.kind === 'text') return Buffer.from(value.value, 'utf8')
    return undefined
  },
}

const DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?Z?$/

/**
 * Parse `YYYY-MM-DD[ HH:MM[:SS[.SSS]]]`, with an optional `T` separator and
 * trailing `Z`. Times without a zone are UTC.
 */
export function parseDate(value: string): Date | undefined {
  const match = DATE_PATTERN.exec(value)
  if (!match) return undefined
  const [year, month, day, hours, minutes, seconds] = match.slice(1, 7).map((part) => Number(part ?? 0))
  const millis = Number((match[7] ?? '0').padEnd(3, '0'))
  const date = new Date(Date.UTC(2000, 0, 1, hours, minutes, seconds, millis))
  // setUTCFullYear keeps years below 100 as written
  date.setUTCFullYear(year, month - 1, day)
  // Out-of-range parts (Feb 30, 25:00) roll over instead of failing
  if (
    Number.isNaN(date.getTime()) ||
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    return undefined
  }
  return date
}

function fromMillis(millis: number): Date | undefined {
  const date = new Date(millis)
  return Number.isNaN(date.getTime()) ? undefined : date
}

/**
 * Dates store as UTC text with millisecond precision. Numbers read as Unix
 * timestamps in seconds.
 */
const dateConverter: ValueConverter<Date> = {
  name: 'date',
  toDatabaseValue(value) {
    if (Number.isNaN(value.getTime())) {
      throw new BindingError('Cannot bind an invalid Date')
    }
    return text(formatDate(value))
  },
  fromDatabaseValue(value) {
    switch (value.kind) {
      case 'text':
        return parseDate(value.value)
      case 'integer':
        return fromMillis(Number(value.value) * 1000)
      case 'real':
        return fromMillis(Math.round(value.value * 1000))
      default:
        return undefined
    }
  },
}

/**
 * JSON text checked against a TypeBox schema. Text that does not parse, or
 * does not match, reads as absent.
 */
function jsonConverter<S extends TSchema>(schema: S): ValueConverter<Static<S>> {
  return {
    name: 'json',
    toDatabaseValue: (value) => text(JSON.stringify(value)),
    fromDatabaseValue(value) {
      if (value.kind !== 'text') return undefined
      let parsed: unknown
      try {
        parsed = JSON.parse(value.value)
      } catch {
        return undefined
      }
      return Value.Check(schema, parsed) ? parsed : undefined
    },
  }
}

export const Converters = {
  integer: integerConverter,
  bigint: bigintConverter,
  real: realConverter,
  text: textConverter,
  boolean: booleanConverter,
  blob: blobConverter,
  date: dateConverter,
  json: jsonConverter,
} as const
