// ============================================================================
// Row ordering — resolves a sort directive against the column labels
// ============================================================================

import type { SortDirective, WarningHandler } from './types.ts'

/**
 * Returns the rows in display order.
 *
 * Without a directive, or when the directive names a column that does not
 * exist, the rows come back in insertion order. Otherwise they are stably
 * sorted on the (transformed) cell at the sort column; a row too short to
 * have that cell sorts as ''. The input array is never mutated.
 */
export function orderRows(
  rows: readonly (readonly string[])[],
  columns: readonly string[],
  directive?: SortDirective,
  onWarning?: WarningHandler,
): (readonly string[])[] {
  if (!directive) return [...rows]

  const index = columns.indexOf(directive.column)
  if (index === -1) {
    onWarning?.(`Sort column "${directive.column}" not found in table columns`)
    return [...rows]
  }

  const transform = directive.transform
  // Transform once per row, then sort the keyed entries
  const keyed = rows.map((row, position) => {
    const raw = row[index] ?? ''
    return { row, position, key: transform ? transform(raw) : raw }
  })

  const direction = directive.order === 'descending' ? -1 : 1
  keyed.sort((a, b) => {
    if (a.key !== b.key) return (a.key < b.key ? -1 : 1) * direction
    return a.position - b.position
  })

  return keyed.map(entry => entry.row)
}

/**
 * Sort transform for integer columns: left-pads runs of ASCII digits with
 * zeros to `width` characters so string order matches numeric order.
 * Anything else passes through unchanged.
 *
 * @example
 * ```ts
 * table.sort({ column: 'Age', transform: zeroPad(5) })
 * ```
 */
export function zeroPad(width: number): (value: string) => string {
  return (value) => (/^\d+$/.test(value) ? value.padStart(width, '0') : value)
}
