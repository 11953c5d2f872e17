/** Quote an identifier for interpolation into SQL text. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

/** `"a" = ? AND "b" = ?` */
export function equalityPredicate(columns: readonly string[]): string {
  return columns.map((column) => `${quoteIdentifier(column)} = ?`).join(' AND ')
}
