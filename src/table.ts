// ============================================================================
// AsciiTable — fluent builder over the table renderer
//
//   const text = new AsciiTable(['Name', 'Age'])
//     .addRow(['Alice', '30'])
//     .addRow(['Bob', '25'])
//     .sort({ column: 'Age', transform: zeroPad(3) })
//     .render()
//
// The table owns its columns, rows and configuration. Every setter mutates
// in place and returns `this`; render() reads them without changing anything.
// ============================================================================

import type {
  Alignment,
  BorderGlyphs,
  HorizontalRule,
  SortDirective,
  TableConfig,
  VerticalRule,
  WarningHandler,
} from './ascii/types.ts'
import { renderTableText } from './ascii/renderer.ts'
import { BORDER_STYLES, clampPadding, isBorderStyleName, mergeGlyphs, resolveTableConfig } from './config.ts'

export class AsciiTable {
  private labels: string[]
  private readonly rows: string[][] = []
  private readonly config: TableConfig = resolveTableConfig()
  private readonly alignmentOverrides = new Map<string, Alignment>()
  private warn: WarningHandler | undefined

  constructor(columns: readonly string[] = []) {
    this.labels = [...columns]
    this.config.alignments = this.alignmentOverrides
  }

  /**
   * Appends a row. Rows whose length differs from the column count are
   * kept as they are (missing cells render blank, extra ones are ignored)
   * and reported through {@link onWarning}.
   */
  addRow(row: readonly string[]): this {
    if (this.labels.length > 0 && row.length !== this.labels.length) {
      this.warn?.(`Row has ${row.length} values but table has ${this.labels.length} columns`)
    }
    this.rows.push([...row])
    return this
  }

  addRows(rows: readonly (readonly string[])[]): this {
    for (const row of rows) this.addRow(row)
    return this
  }

  /** Replaces the column labels. Existing rows are kept. */
  columns(labels: readonly string[]): this {
    this.labels = [...labels]
    return this
  }

  /** Draw horizontal rules (false leaves their lines empty). */
  border(enabled: boolean): this {
    this.config.border = enabled
    return this
  }

  horizontalRules(mode: HorizontalRule): this {
    this.config.horizontalRules = mode
    return this
  }

  verticalRules(mode: VerticalRule): this {
    this.config.verticalRules = mode
    return this
  }

  /** Spaces on each side of every cell; negative values become 0. */
  padding(width: number): this {
    this.config.padding = clampPadding(width)
    return this
  }

  header(show: boolean): this {
    this.config.header = show
    return this
  }

  /**
   * Sets the alignment of one column, or the default for every column
   * without an override when `column` is omitted.
   */
  alignment(align: Alignment, column?: string): this {
    if (column === undefined) {
      this.config.defaultAlignment = align
    } else {
      this.alignmentOverrides.set(column, align)
    }
    return this
  }

  /** Overrides individual border glyphs. Throws if a glyph is not one cell wide. */
  glyphs(glyphs: Partial<BorderGlyphs>): this {
    this.config.glyphs = mergeGlyphs(this.config.glyphs, glyphs)
    return this
  }

  /** Switches to one of the {@link BORDER_STYLES} glyph sets. */
  borderStyle(name: string): this {
    if (!isBorderStyleName(name)) {
      throw new Error(
        `Unknown border style: '${name}'. Expected one of: ${Object.keys(BORDER_STYLES).join(', ')}`
      )
    }
    this.config.glyphs = BORDER_STYLES[name]
    return this
  }

  sort(directive: SortDirective): this {
    this.config.sort = directive
    return this
  }

  clearSort(): this {
    delete this.config.sort
    return this
  }

  /** Receives diagnostics from addRow() and render(). */
  onWarning(handler: WarningHandler | undefined): this {
    this.warn = handler
    return this
  }

  render(): string {
    return renderTableText(this.labels, this.rows, this.config, this.warn)
  }

  toString(): string {
    return this.render()
  }
}
