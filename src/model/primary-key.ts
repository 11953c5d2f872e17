/**
 * How an entity type identifies its rows.
 *
 * - none: no key; fetch-by-key, insert, update and delete are unsupported
 * - rowid: the engine-generated row id, read back into the record on insert
 * - single: one application-assigned column
 * - composite: several columns, matched in declared order
 */
export type PrimaryKey =
  | { readonly kind: 'none' }
  | { readonly kind: 'rowid'; readonly column: string }
  | { readonly kind: 'single'; readonly column: string }
  | { readonly kind: 'composite'; readonly columns: readonly string[] }

export const PrimaryKey = {
  none: (): PrimaryKey => ({ kind: 'none' }),
  /** `column` is the INTEGER PRIMARY KEY alias, or `rowid` itself. */
  rowid: (column = 'rowid'): PrimaryKey => ({ kind: 'rowid', column }),
  single: (column: string): PrimaryKey => ({ kind: 'single', column }),
  composite: (...columns: string[]): PrimaryKey => ({ kind: 'composite', columns: Object.freeze(columns) }),
} as const

export function keyColumns(primaryKey: PrimaryKey): readonly string[] {
  switch (primaryKey.kind) {
    case 'none':
      return []
    case 'rowid':
    case 'single':
      return [primaryKey.column]
    case 'composite':
      return primaryKey.columns
  }
}

const HIDDEN_ROWID_NAMES = new Set(['rowid', '_rowid_', 'oid'])

/** True when the key is the hidden row id, which `SELECT *` does not return. */
export function isHiddenRowid(primaryKey: PrimaryKey): boolean {
  return primaryKey.kind === 'rowid' && HIDDEN_ROWID_NAMES.has(primaryKey.column.toLowerCase())
}
