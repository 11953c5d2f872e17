import { BindingError } from './errors.js'
import { toDatabaseValue, toNativeValue, type Bindable, type NativeValue } from './value.js'

/**
 * Statement arguments: a dense sequence for `?` placeholders (the first
 * element fills `?1`), or a mapping for `:name` placeholders. Mapping keys
 * may be written with or without their `:`, `@` or `$` prefix.
 */
export type Bindings = readonly Bindable[] | Readonly<Record<string, Bindable>>

export function isPositional(bindings: Bindings): bindings is readonly Bindable[] {
  return Array.isArray(bindings)
}

function convert(value: Bindable, label: string, sql: string | undefined): NativeValue {
  try {
    return toNativeValue(toDatabaseValue(value))
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new BindingError(`Argument ${label}: ${reason}`, sql, { cause: err })
  }
}

/**
 * Convert bindings into the argument list better-sqlite3 expects: spread
 * values for positional bindings, a single bare-named object otherwise.
 *
 * @throws BindingError when an argument has no storage representation
 */
export function toNativeArguments(bindings: Bindings | undefined, sql?: string): unknown[] {
  if (bindings === undefined) return []
  if (isPositional(bindings)) {
    return bindings.map((value, index) => convert(value, `?${index + 1}`, sql))
  }
  const entries = Object.entries(bindings)
  if (entries.length === 0) return []
  const named: Record<string, NativeValue> = {}
  for (const [key, value] of entries) {
    const name = /^[:@$]/.test(key) ? key.slice(1) : key
    if (name.length === 0) {
      throw new BindingError('Named argument keys cannot be empty', sql)
    }
    named[name] = convert(value, `:${name}`, sql)
  }
  return [named]
}
