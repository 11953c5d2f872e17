import type { ValueConverter } from '../database/converters.js'
import { toExtractor, type Extractable, type Row, type RowExtractor } from '../database/row.js'

/** The object type a projection shape extracts. */
export type Projected<S> = {
  [K in keyof S]: S[K] extends RowExtractor<infer U> ? U : S[K] extends ValueConverter<infer V> ? V : never
}

/**
 * Compose extractors into one, each reading the same row independently.
 *
 * This is how a query that joins or aggregates extra columns onto an
 * entity is read: embed the entity's Model next to the extra fields.
 *
 * ```ts
 * const PersonWithPetCount = projection({
 *   person: Person,
 *   petCount: required(Converters.integer, 'petCount'),
 * })
 * ```
 */
export function projection<S extends Record<string, Extractable<unknown>>>(shape: S): RowExtractor<Projected<S>> {
  const extractors = Object.entries(shape).map(([key, target]) => [key, toExtractor(target)] as const)
  return {
    extract(row: Row): Projected<S> {
      const result: Record<string, unknown> = {}
      for (const [key, extractor] of extractors) {
        result[key] = extractor.extract(row)
      }
      return result as unknown as Projected<S>
    },
  }
}
