/**
 * Column Inference
 *
 * Scan phase of encoding: collects property keys and settles one type tag
 * per column before any row is written.
 */

import { MalformedHeaderError, type TableKind } from '../errors'
import type { PropertyMap } from '../graph/types'
import type { Logger } from '../utils/logger'
import { inferTag, type ObservedTag } from './values'
import { RESERVED_PROPERTY_KEY, isArrayTag, type PropertyColumn, type TypeTag } from './types'

export type ColumnOrder = 'first-seen' | 'sorted'

/**
 * Join two observed tags into the narrowest tag that holds both.
 *
 * - `int` and `float` widen to `float` (and `int[]`/`float[]` to `float[]`)
 * - an empty array adopts any array tag
 * - two other array tags widen to `string[]`
 * - everything else widens to `string`
 */
export function widen(a: ObservedTag, b: ObservedTag): ObservedTag {
  if (a === b) return a
  if (a === '[]') return b !== '[]' && isArrayTag(b) ? b : 'string'
  if (b === '[]') return isArrayTag(a) ? a : 'string'

  const numeric = new Set<ObservedTag>([a, b])
  if (numeric.has('int') && numeric.has('float')) return 'float'
  if (numeric.has('int[]') && numeric.has('float[]')) return 'float[]'
  if (isArrayTag(a) && isArrayTag(b)) return 'string[]'
  return 'string'
}

/**
 * Final tag of a column. A column that only held empty arrays is `string[]`.
 */
export function finalizeTag(tag: ObservedTag): TypeTag {
  return tag === '[]' ? 'string[]' : tag
}

/**
 * Reject keys that cannot be written as a property column.
 */
export function assertPropertyKey(table: TableKind, key: string): void {
  if (key === '') {
    throw new MalformedHeaderError('property keys must not be empty', table, key)
  }
  if (key.startsWith(':')) {
    throw new MalformedHeaderError(`property key '${key}' collides with a structural column`, table, key)
  }
  if (key === RESERVED_PROPERTY_KEY) {
    throw new MalformedHeaderError(`property key '${key}' is reserved`, table, key)
  }
}

/**
 * Accumulates the columns of one table across all of its records.
 * Keys that only ever hold null or undefined produce no column.
 */
export class ColumnInference {
  /** Observed tag per key, in first-seen order */
  private readonly observed = new Map<string, ObservedTag>()

  constructor(
    private readonly table: TableKind,
    private readonly logger?: Logger,
  ) {}

  /**
   * Fold one record's properties into the column set.
   * @throws UnsupportedTypeError
   * @throws MalformedHeaderError
   */
  observe(properties: PropertyMap): void {
    for (const [key, value] of Object.entries(properties)) {
      assertPropertyKey(this.table, key)
      const tag = inferTag(key, value)
      if (tag === undefined) continue

      const previous = this.observed.get(key)
      if (previous === undefined) {
        this.observed.set(key, tag)
        continue
      }

      const widened = widen(previous, tag)
      if (widened !== previous) {
        this.logger?.debug('Widened column type', { table: this.table, key, from: previous, to: widened })
        this.observed.set(key, widened)
      }
    }
  }

  /**
   * Finalized property columns.
   */
  columns(order: ColumnOrder = 'first-seen'): PropertyColumn[] {
    const columns = Array.from(this.observed, ([name, tag]) => ({ name, tag: finalizeTag(tag) }))
    if (order === 'sorted') {
      columns.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    }
    return columns
  }
}
