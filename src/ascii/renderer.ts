// ============================================================================
// ASCII renderer — tables
//
// Renders columns + rows to fixed-width text:
//
//   +-------+-----+
//   | Name  | Age |
//   +-------+-----+
//   | Alice | 30  |
//   +-------+-----+
//
// Everything is recomputed per call (sort order, column widths, rules), so
// rendering an unchanged table twice gives identical output.
// ============================================================================

import type { TableConfig, WarningHandler } from './types.ts'
import { displayWidth } from './display-width.ts'
import { padCell } from './pad.ts'
import { orderRows } from './sort.ts'

// ============================================================================
// Column widths
// ============================================================================

/**
 * Widest display width per column, over the header and every row.
 * Cells past the last column are ignored; short rows simply don't
 * contribute to the columns they lack.
 */
export function computeColumnWidths(
  columns: readonly string[],
  rows: readonly (readonly string[])[],
): number[] {
  const widths = columns.map(label => displayWidth(label))
  for (const row of rows) {
    const count = Math.min(row.length, widths.length)
    for (let i = 0; i < count; i++) {
      widths[i] = Math.max(widths[i] ?? 0, displayWidth(row[i] ?? ''))
    }
  }
  return widths
}

// ============================================================================
// Lines
// ============================================================================

/**
 * Horizontal rule, e.g. `+-------+-----+`.
 * Empty when borders are disabled.
 */
export function renderHorizontalRule(widths: readonly number[], config: TableConfig): string {
  if (!config.border) return ''

  const { horizontal, junction } = config.glyphs
  const framed = config.verticalRules !== 'none'
  const separator = config.verticalRules === 'all' ? junction : horizontal

  const runs = widths.map(w => horizontal.repeat(w + config.padding * 2))
  const body = runs.join(separator)
  return framed ? junction + body + junction : body
}

/**
 * One header or data line. A short row stops after its last cell, so an
 * empty row is just the left edge; extra cells beyond the columns are dropped.
 */
export function renderRow(
  cells: readonly string[],
  columns: readonly string[],
  widths: readonly number[],
  config: TableConfig,
): string {
  const { vertical } = config.glyphs
  const space = ' '.repeat(config.padding)
  const count = Math.min(cells.length, widths.length)

  const parts: string[] = []
  for (let i = 0; i < count; i++) {
    const label = columns[i] ?? ''
    const alignment = config.alignments.get(label) ?? config.defaultAlignment
    parts.push(space + padCell(cells[i] ?? '', widths[i] ?? 0, alignment) + space)
  }

  switch (config.verticalRules) {
    case 'all':
      return count === 0 ? vertical : vertical + parts.join(vertical) + vertical
    case 'frame':
      return count === 0 ? vertical : vertical + parts.join(' ') + vertical
    case 'none':
      return parts.join('')
  }
}

// ============================================================================
// Table
// ============================================================================

/**
 * Renders the complete table. An empty column set renders as ''.
 *
 * Line order: top rule, header, header rule, data rows (with rules between
 * them under `horizontalRules: 'all'`), bottom rule. Which rules appear
 * depends on `config.horizontalRules`; lines are joined with '\n' and there
 * is no trailing newline.
 */
export function renderTableText(
  columns: readonly string[],
  rows: readonly (readonly string[])[],
  config: TableConfig,
  onWarning?: WarningHandler,
): string {
  if (columns.length === 0) return ''

  const displayRows = orderRows(rows, columns, config.sort, onWarning)
  const widths = computeColumnWidths(columns, displayRows)
  const rule = renderHorizontalRule(widths, config)
  const hrules = config.horizontalRules

  const lines: string[] = []

  if (hrules !== 'none') lines.push(rule)

  if (config.header) {
    lines.push(renderRow(columns, columns, widths, config))
    if (hrules !== 'none') lines.push(rule)
  }

  displayRows.forEach((row, index) => {
    lines.push(renderRow(row, columns, widths, config))
    if (hrules === 'all' && index < displayRows.length - 1) lines.push(rule)
  })

  if (hrules === 'frame' || hrules === 'all') lines.push(rule)

  return lines.join('\n')
}
