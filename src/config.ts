// ============================================================================
// Table configuration — defaults, border glyph presets and option resolution
//
// Options come in as a partial object (from the fluent builder, the
// functional API or the CLI) and are resolved against DEFAULT_CONFIG once.
// Padding is clamped and glyphs are validated here, never at render time.
// ============================================================================

import type { Alignment, BorderGlyphs, TableConfig, TableOptions } from './ascii/types.ts'
import { displayWidth } from './ascii/display-width.ts'

// ============================================================================
// Border styles
// ============================================================================

export const BORDER_STYLES = Object.freeze({
  ascii:   Object.freeze({ horizontal: '-', vertical: '|', junction: '+' }),
  unicode: Object.freeze({ horizontal: '─', vertical: '│', junction: '┼' }),
  heavy:   Object.freeze({ horizontal: '━', vertical: '┃', junction: '╋' }),
  double:  Object.freeze({ horizontal: '═', vertical: '║', junction: '╬' }),
} as const satisfies Record<string, BorderGlyphs>)

export type BorderStyleName = keyof typeof BORDER_STYLES

export function isBorderStyleName(name: string): name is BorderStyleName {
  return Object.hasOwn(BORDER_STYLES, name)
}

// ============================================================================
// Defaults
// ============================================================================

/** Default configuration: ASCII borders, framed rules, one space of padding. */
export const DEFAULT_CONFIG: Readonly<TableConfig> = Object.freeze<TableConfig>({
  border: true,
  horizontalRules: 'frame',
  verticalRules: 'all',
  padding: 1,
  header: true,
  defaultAlignment: 'left',
  alignments: new Map<string, Alignment>(),
  glyphs: BORDER_STYLES.ascii,
})

// ============================================================================
// Validation
// ============================================================================

/**
 * Normalizes a padding width to a non-negative integer.
 * Negative and non-finite values become 0, fractions are floored.
 */
export function clampPadding(width: number): number {
  if (!Number.isFinite(width)) return 0
  return Math.max(0, Math.floor(width))
}

/** Throws unless every glyph is a single character one cell wide. */
export function validateGlyphs(glyphs: BorderGlyphs): void {
  for (const name of ['horizontal', 'vertical', 'junction'] as const) {
    const glyph = glyphs[name]
    if (displayWidth(glyph) !== 1 || [...glyph].length !== 1) {
      throw new Error(
        `Invalid ${name} glyph: '${glyph}'. ` +
        `Border glyphs must be a single character one cell wide.`
      )
    }
  }
}

/** Merges glyph overrides over a base set and validates the result. */
export function mergeGlyphs(base: BorderGlyphs, overrides: Partial<BorderGlyphs>): BorderGlyphs {
  const glyphs: BorderGlyphs = {
    horizontal: overrides.horizontal ?? base.horizontal,
    vertical: overrides.vertical ?? base.vertical,
    junction: overrides.junction ?? base.junction,
  }
  validateGlyphs(glyphs)
  return glyphs
}

// ============================================================================
// Resolution
// ============================================================================

/** Resolves partial options against {@link DEFAULT_CONFIG}. */
export function resolveTableConfig(options: TableOptions = {}): TableConfig {
  const config: TableConfig = {
    border: options.border ?? DEFAULT_CONFIG.border,
    horizontalRules: options.horizontalRules ?? DEFAULT_CONFIG.horizontalRules,
    verticalRules: options.verticalRules ?? DEFAULT_CONFIG.verticalRules,
    padding: options.padding === undefined ? DEFAULT_CONFIG.padding : clampPadding(options.padding),
    header: options.header ?? DEFAULT_CONFIG.header,
    defaultAlignment: options.align ?? DEFAULT_CONFIG.defaultAlignment,
    alignments: new Map(Object.entries<Alignment>(options.alignments ?? {})),
    glyphs: options.glyphs ? mergeGlyphs(DEFAULT_CONFIG.glyphs, options.glyphs) : DEFAULT_CONFIG.glyphs,
  }
  if (options.sort) config.sort = options.sort
  return config
}
