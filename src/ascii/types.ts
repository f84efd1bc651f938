// ============================================================================
// Table model — rule modes, alignment, glyphs and the resolved configuration
// ============================================================================

/** Where horizontal rules are drawn. */
export type HorizontalRule =
  | 'none'    // no horizontal lines
  | 'frame'   // top, below the header, and bottom
  | 'header'  // top and below the header only
  | 'all'     // additionally between every data row

/** Where vertical rules are drawn. */
export type VerticalRule =
  | 'none'    // no vertical lines
  | 'frame'   // left and right edges only
  | 'all'     // edges and between every column

export type Alignment = 'left' | 'center' | 'right'

export type SortOrder = 'ascending' | 'descending'

/**
 * Row ordering applied before rendering.
 *
 * Keys are compared as plain strings (code unit order). To sort numbers,
 * give a `transform` that turns each value into a sortable string, e.g.
 * {@link zeroPad}.
 */
export interface SortDirective {
  /** Column label to sort by. Unknown labels leave the rows unsorted. */
  column: string
  /** Default: 'ascending' */
  order?: SortOrder
  /** Applied to each cell before comparison. Must be pure. */
  transform?: (value: string) => string
}

/** Characters used to draw rules. Each must occupy exactly one cell. */
export interface BorderGlyphs {
  horizontal: string
  vertical: string
  /** Drawn where a horizontal rule meets a vertical rule or frame edge */
  junction: string
}

/** Receives non-fatal diagnostics (unknown sort column, row arity mismatch). */
export type WarningHandler = (message: string) => void

/** Fully resolved rendering configuration. */
export interface TableConfig {
  border: boolean
  horizontalRules: HorizontalRule
  verticalRules: VerticalRule
  /** Spaces on each side of every cell. Always a non-negative integer. */
  padding: number
  header: boolean
  defaultAlignment: Alignment
  /** Per-column alignment overrides keyed by column label */
  alignments: ReadonlyMap<string, Alignment>
  glyphs: Readonly<BorderGlyphs>
  sort?: SortDirective
}

/**
 * Options accepted by {@link renderTable}. Every field is optional and
 * falls back to {@link DEFAULT_CONFIG}.
 */
export interface TableOptions {
  /** Draw horizontal rules at all. Default: true */
  border?: boolean
  /** Default: 'frame' */
  horizontalRules?: HorizontalRule
  /** Default: 'all' */
  verticalRules?: VerticalRule
  /** Default: 1. Negative values are clamped to 0. */
  padding?: number
  /** Show the header row. Default: true */
  header?: boolean
  /** Default: 'left' */
  align?: Alignment
  alignments?: Record<string, Alignment>
  /** Overrides individual glyphs of the ASCII default set. */
  glyphs?: Partial<BorderGlyphs>
  sort?: SortDirective
  onWarning?: WarningHandler
}
