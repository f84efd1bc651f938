// ============================================================================
// Display width — how many monospace cells a string occupies
//
// A pragmatic range table rather than full East Asian Width data. Symbols in
// U+2600–26FF (⚠ ☀ ★) stay narrow: terminals disagree on them, with or
// without a presentation selector, and most draw them in one cell.
// ============================================================================

/** CSI escape sequences: ESC [ params letter (colors, bold, cursor moves). */
const ANSI_CSI_RE = /\u001B\[[0-9;]*[A-Za-z]/g

const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f],   // Hangul Jamo
  [0x2e80, 0x2eff],   // CJK Radicals Supplement
  [0x3000, 0x303f],   // CJK Symbols and Punctuation
  [0x3040, 0x309f],   // Hiragana
  [0x30a0, 0x30ff],   // Katakana
  [0x3100, 0x312f],   // Bopomofo
  [0x3130, 0x318f],   // Hangul Compatibility Jamo
  [0x3190, 0x319f],   // Kanbun
  [0x31a0, 0x31bf],   // Bopomofo Extended
  [0x31c0, 0x31ef],   // CJK Strokes
  [0x31f0, 0x31ff],   // Katakana Phonetic Extensions
  [0x3200, 0x32ff],   // Enclosed CJK Letters and Months
  [0x3300, 0x33ff],   // CJK Compatibility
  [0x3400, 0x4dbf],   // CJK Unified Ideographs Extension A
  [0x4dc0, 0x4dff],   // Yijing Hexagram Symbols
  [0x4e00, 0x9fff],   // CJK Unified Ideographs
  [0xa000, 0xa48f],   // Yi Syllables
  [0xa490, 0xa4cf],   // Yi Radicals
  [0xac00, 0xd7af],   // Hangul Syllables
  [0xf900, 0xfaff],   // CJK Compatibility Ideographs
  [0xfe10, 0xfe1f],   // Vertical Forms
  [0xfe30, 0xfe4f],   // CJK Compatibility Forms
  [0xff00, 0xff60],   // Fullwidth Forms
  [0xffe0, 0xffe6],   // Fullwidth Signs
]

const EMOJI_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1f300, 0x1f9ff], // Pictographs, emoticons, transport, supplemental symbols
  [0x2700, 0x27bf],   // Dingbats (✅ ❌ ✔)
  [0x1f000, 0x1f02f], // Mahjong tiles
  [0x1f0a0, 0x1f0ff], // Playing cards
  [0x1fa00, 0x1faff], // Symbols and Pictographs Extended-A
]

function inRanges(code: number, ranges: ReadonlyArray<readonly [number, number]>): boolean {
  for (const [start, end] of ranges) {
    if (code >= start && code <= end) return true
  }
  return false
}

/** U+FDD0–FDEF plus the last two code points of every plane. */
function isNoncharacter(code: number): boolean {
  return (code >= 0xfdd0 && code <= 0xfdef) || (code & 0xfffe) === 0xfffe
}

/** Characters that take no cell of their own. */
function isZeroWidth(code: number): boolean {
  return (
    isNoncharacter(code) ||
    (code >= 0xfe00 && code <= 0xfe0f) || // Variation selectors
    (code >= 0x200b && code <= 0x200d)    // ZWSP, ZWNJ, ZWJ
  )
}

/** Removes ANSI CSI escape sequences from `text`. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_CSI_RE, '')
}

/**
 * Width of a single character (one code point) in cells: 0, 1 or 2.
 * Wide CJK ranges are checked first, then zero-width markers, then emoji.
 */
export function charWidth(ch: string): number {
  const code = ch.codePointAt(0)
  if (code === undefined) return 0

  if (inRanges(code, WIDE_RANGES)) return 2
  if (isZeroWidth(code)) return 0
  if (inRanges(code, EMOJI_RANGES)) return 2
  return 1
}

/**
 * Returns the *display width* of `text` in a monospace terminal.
 * ANSI escape sequences are not counted.
 */
export function displayWidth(text: string): number {
  let w = 0
  for (const ch of stripAnsi(text)) {
    w += charWidth(ch)
  }
  return w
}
