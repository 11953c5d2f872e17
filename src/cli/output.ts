import { describeDatabaseValue, type DatabaseValue } from '../database/value.js'
import type { Row } from '../database/row.js'

/**
 * Consistent CLI output helpers.
 *
 * All output uses process.stdout/stderr.write for testability.
 * No colors, no emojis -- clean text output only.
 */
export const output = {
  /** Write an informational message to stdout. */
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Write a success message to stdout, prefixed with "OK:". */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  /** Write an error message to stderr, prefixed with "Error:". */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** Write a simple column-aligned table to stdout. */
  table(data: Record<string, string>[]): void {
    if (data.length === 0) return
    const keys = Object.keys(data[0])
    const widths = keys.map((k) =>
      Math.max(k.length, ...data.map((row) => (row[k] ?? '').length)),
    )
    const header = keys.map((k, i) => k.padEnd(widths[i])).join('  ')
    process.stdout.write(header + '\n')
    process.stdout.write(widths.map((w) => '-'.repeat(w)).join('  ') + '\n')
    for (const row of data) {
      const line = keys.map((k, i) => (row[k] ?? '').padEnd(widths[i])).join('  ')
      process.stdout.write(line + '\n')
    }
  },

  /** Write fetched rows as a table, or "(no rows)". */
  rows(rows: Row[]): void {
    if (rows.length === 0) {
      process.stdout.write('(no rows)\n')
      return
    }
    output.table(rows.map((row) => {
      const record: Record<string, string> = {}
      for (const [name, value] of Object.entries(row.toObject())) {
        record[name] = formatCell(value)
      }
      return record
    }))
  },
}

/** Text cells print verbatim; other kinds as in error messages. */
export function formatCell(value: DatabaseValue): string {
  return value.kind === 'text' ? value.value : describeDatabaseValue(value)
}
