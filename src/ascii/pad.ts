import type { Alignment } from './types.ts'
import { displayWidth } from './display-width.ts'

/**
 * Pads `text` with spaces to `width` display cells.
 *
 * Never truncates: text already at or beyond `width` is returned as is.
 * Centered text gets the extra space on the right when the slack is odd.
 * ANSI escapes in `text` are kept and take no width.
 */
export function padCell(text: string, width: number, alignment: Alignment): string {
  const current = displayWidth(text)
  if (current >= width) return text
  const slack = width - current

  switch (alignment) {
    case 'left':
      return text + ' '.repeat(slack)
    case 'right':
      return ' '.repeat(slack) + text
    case 'center': {
      const left = Math.floor(slack / 2)
      return ' '.repeat(left) + text + ' '.repeat(slack - left)
    }
  }
}
