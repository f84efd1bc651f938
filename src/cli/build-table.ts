// ============================================================================
// monotable CLI — maps parsed arguments and input records onto an AsciiTable
// ============================================================================

import type { WarningHandler } from '../ascii/types.ts'
import { zeroPad } from '../ascii/sort.ts'
import { computeColumnWidths } from '../ascii/renderer.ts'
import { AsciiTable } from '../table.ts'
import type { CliArgs } from './args.ts'

/**
 * Splits records into column labels and data rows. Without a header row
 * the columns are numbered 1..N, N being the widest record.
 */
export function splitRecords(records: readonly string[][], headerRow: boolean): { columns: string[]; rows: string[][] } {
  if (headerRow) {
    const [columns = [], ...rows] = records
    return { columns, rows }
  }
  const count = records.reduce((max, record) => Math.max(max, record.length), 0)
  const columns = Array.from({ length: count }, (_, i) => String(i + 1))
  return { columns, rows: [...records] }
}

/** Longest value at `index` across the rows; --numeric pads keys to it. */
function longestValue(rows: readonly string[][], index: number): number {
  return rows.reduce((max, row) => Math.max(max, row[index]?.length ?? 0), 0)
}

export function buildTable(records: readonly string[][], args: CliArgs, onWarning?: WarningHandler): AsciiTable {
  const { columns, rows } = splitRecords(records, args.headerRow)
  const table = new AsciiTable(columns).onWarning(onWarning)

  table.addRows(rows)
  table.header(args.showHeader ?? args.headerRow)
  table.border(args.border)

  if (args.horizontalRules) table.horizontalRules(args.horizontalRules)
  if (args.verticalRules) table.verticalRules(args.verticalRules)
  if (args.padding !== undefined) table.padding(args.padding)
  if (args.align) table.alignment(args.align)
  for (const { column, align } of args.columnAlign) table.alignment(align, column)
  if (args.style) table.borderStyle(args.style)

  if (args.sortColumn !== undefined) {
    table.sort({
      column: args.sortColumn,
      order: args.descending ? 'descending' : 'ascending',
      transform: args.numeric ? zeroPad(longestValue(rows, columns.indexOf(args.sortColumn))) : undefined,
    })
  }

  return table
}

/** `--widths` report: one row per column with its computed display width. */
export function renderWidthReport(records: readonly string[][], args: CliArgs): string {
  const { columns, rows } = splitRecords(records, args.headerRow)
  const widths = computeColumnWidths(columns, rows)
  const report = new AsciiTable(['Column', 'Width']).alignment('right', 'Width')
  columns.forEach((label, i) => report.addRow([label, String(widths[i] ?? 0)]))
  return report.render()
}
