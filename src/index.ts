// ============================================================================
// monotable — fixed-width text tables for the terminal
//
// Column widths follow what a terminal actually draws: CJK and emoji take
// two cells, combining/zero-width markers none, and ANSI color codes are
// ignored when measuring but kept in the output.
// ============================================================================

import type { TableOptions } from './ascii/types.ts'
import { renderTableText } from './ascii/renderer.ts'
import { resolveTableConfig } from './config.ts'

export { AsciiTable } from './table.ts'
export { displayWidth, charWidth, stripAnsi } from './ascii/display-width.ts'
export { padCell } from './ascii/pad.ts'
export { orderRows, zeroPad } from './ascii/sort.ts'
export { computeColumnWidths } from './ascii/renderer.ts'
export { DEFAULT_CONFIG, BORDER_STYLES, resolveTableConfig } from './config.ts'
export type { BorderStyleName } from './config.ts'
export type {
  Alignment,
  BorderGlyphs,
  HorizontalRule,
  SortDirective,
  SortOrder,
  TableConfig,
  TableOptions,
  VerticalRule,
  WarningHandler,
} from './ascii/types.ts'

/**
 * Render a table in one call.
 *
 * @example
 * ```ts
 * renderTable(['Name', 'Age'], [['Alice', '30'], ['Bob', '25']])
 * // +-------+-----+
 * // | Name  | Age |
 * // +-------+-----+
 * // | Alice | 30  |
 * // | Bob   | 25  |
 * // +-------+-----+
 * ```
 */
export function renderTable(
  columns: readonly string[],
  rows: readonly (readonly string[])[],
  options: TableOptions = {},
): string {
  return renderTableText(columns, rows, resolveTableConfig(options), options.onWarning)
}
