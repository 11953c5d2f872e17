import { Value } from '@sinclair/typebox/value'
import { ConnectionError } from '../database/errors.js'
import { DatabaseOptionsSchema, type DatabaseOptions } from '../types/config.js'
import { DEFAULT_DATABASE_OPTIONS } from './defaults.js'

/**
 * Merge caller options over the defaults and validate the result.
 * Keys explicitly set to undefined keep their default.
 *
 * @throws ConnectionError (INVALID_OPTIONS) with field-level details
 */
export function resolveDatabaseOptions(options: Partial<DatabaseOptions> = {}): DatabaseOptions {
  const merged: Record<string, unknown> = { ...DEFAULT_DATABASE_OPTIONS }
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) merged[key] = value
  }

  if (!Value.Check(DatabaseOptionsSchema, merged)) {
    const fields = [...Value.Errors(DatabaseOptionsSchema, merged)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConnectionError('INVALID_OPTIONS', `Database options invalid:\n${fieldMessages}`, { fields })
  }

  return merged
}
