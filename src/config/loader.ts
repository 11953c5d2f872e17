import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { RowkeeperConfigSchema, type RowkeeperConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

export type ConfigErrorCode = 'NOT_FOUND' | 'UNREADABLE' | 'INVALID_JSON' | 'INVALID'

/** The config file is missing, unparseable or fails the schema. */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode
  public readonly fields: Array<{ path: string; message: string }>

  constructor(
    code: ConfigErrorCode,
    message: string,
    options: { cause?: unknown; fields?: Array<{ path: string; message: string }> } = {},
  ) {
    super(message, { cause: options.cause })
    this.name = 'ConfigError'
    this.code = code
    this.fields = options.fields ?? []
  }
}

/** Sections and options below this prefix, joined by `__`. */
const ENV_PREFIX = 'ROWKEEPER_'

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/** Later layers win; arrays and scalars replace. */
function merge(base: Record<string, unknown>, layer: Record<string, unknown>): Record<string, unknown> {
  const merged = { ...base }
  for (const [key, value] of Object.entries(layer)) {
    const current = merged[key]
    merged[key] = isPlainObject(current) && isPlainObject(value) ? merge(current, value) : value
  }
  return merged
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let content: string
  try {
    content = readFileSync(configPath, 'utf-8')
  } catch (err) {
    const notFound = err instanceof Error && 'code' in err && err.code === 'ENOENT'
    throw notFound
      ? new ConfigError('NOT_FOUND', `Configuration file not found: ${configPath}`, { cause: err })
      : new ConfigError('UNREADABLE', `Failed to read configuration file: ${configPath}`, { cause: err })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    throw new ConfigError('INVALID_JSON', `Invalid JSON in configuration file: ${configPath}`, { cause: err })
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError('INVALID_JSON', `Configuration file must contain a JSON object: ${configPath}`)
  }
  return parsed
}

/** Spell a lowercased env segment the way the defaults do, when they know it. */
function canonicalKey(shape: unknown, segment: string): string {
  if (!isPlainObject(shape)) return segment
  return Object.keys(shape).find((key) => key.toLowerCase() === segment) ?? segment
}

/**
 * `ROWKEEPER_DATABASE__TIMEOUTMS=100` becomes `{ database: { timeoutMs: 100 } }`.
 * Strings convert to the schema's number and boolean types.
 */
function environmentOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {}
  for (const [name, raw] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || raw === undefined) continue
    const segments = name.slice(ENV_PREFIX.length).toLowerCase().split('__')
    // ROWKEEPER_LOG_LEVEL and friends belong to the logger
    if (segments.length < 2) continue

    let target = overrides
    let shape: unknown = DEFAULT_CONFIG
    for (const segment of segments.slice(0, -1)) {
      const key = canonicalKey(shape, segment)
      shape = isPlainObject(shape) ? shape[key] : undefined
      const next = target[key]
      if (isPlainObject(next)) {
        target = next
      } else {
        const created: Record<string, unknown> = {}
        target[key] = created
        target = created
      }
    }
    target[canonicalKey(shape, segments[segments.length - 1])] = raw
  }

  const converted = Value.Convert(RowkeeperConfigSchema, overrides)
  return isPlainObject(converted) ? converted : overrides
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object') deepFreeze(child)
  }
  return Object.freeze(value)
}

/**
 * Load rowkeeper.config.json. Defaults fill what the file leaves out, then
 * `ROWKEEPER_<SECTION>__<OPTION>` variables override both. The result is
 * frozen.
 *
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): RowkeeperConfig {
  const defaults = structuredClone(DEFAULT_CONFIG)
  const config = merge(merge(defaults, readConfigFile(configPath)), environmentOverrides(env))

  if (!Value.Check(RowkeeperConfigSchema, config)) {
    const fields = [...Value.Errors(RowkeeperConfigSchema, config)].map((error) => ({
      path: error.path,
      message: error.message,
    }))
    const details = fields.map((field) => `  - ${field.path}: ${field.message}`).join('\n')
    throw new ConfigError('INVALID', `Configuration invalid:\n${details}`, { fields })
  }
  return deepFreeze(config)
}
