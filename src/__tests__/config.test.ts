import { describe, expect, it } from 'vitest'
import { BORDER_STYLES, DEFAULT_CONFIG, clampPadding, isBorderStyleName, resolveTableConfig, validateGlyphs } from '../config.ts'

describe('resolveTableConfig', () => {
  it('returns the defaults for no options', () => {
    const config = resolveTableConfig()
    expect(config.border).toBe(true)
    expect(config.horizontalRules).toBe('frame')
    expect(config.verticalRules).toBe('all')
    expect(config.padding).toBe(1)
    expect(config.header).toBe(true)
    expect(config.defaultAlignment).toBe('left')
    expect(config.alignments.size).toBe(0)
    expect(config.glyphs).toEqual({ horizontal: '-', vertical: '|', junction: '+' })
    expect(config.sort).toBeUndefined()
  })

  it('clamps padding', () => {
    expect(resolveTableConfig({ padding: -2 }).padding).toBe(0)
  })

  it('copies per-column alignments into a map', () => {
    const config = resolveTableConfig({ alignments: { Age: 'right' } })
    expect(config.alignments.get('Age')).toBe('right')
  })

  it('merges glyph overrides over the ASCII set', () => {
    expect(resolveTableConfig({ glyphs: { vertical: '!' } }).glyphs).toEqual({ horizontal: '-', vertical: '!', junction: '+' })
  })

  it('does not share state with DEFAULT_CONFIG', () => {
    const config = resolveTableConfig({ alignments: { A: 'center' } })
    expect(config.alignments).not.toBe(DEFAULT_CONFIG.alignments)
    expect(DEFAULT_CONFIG.alignments.size).toBe(0)
  })
})

describe('clampPadding', () => {
  it('keeps non-negative integers', () => {
    expect(clampPadding(0)).toBe(0)
    expect(clampPadding(4)).toBe(4)
  })

  it('fixes everything else', () => {
    expect(clampPadding(-1)).toBe(0)
    expect(clampPadding(2.7)).toBe(2)
    expect(clampPadding(Number.NaN)).toBe(0)
    expect(clampPadding(Number.POSITIVE_INFINITY)).toBe(0)
  })
})

describe('border styles', () => {
  it('every preset passes glyph validation', () => {
    for (const glyphs of Object.values(BORDER_STYLES)) {
      expect(() => validateGlyphs(glyphs)).not.toThrow()
    }
  })

  it('keeps defaults and presets frozen', () => {
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true)
    expect(Object.isFrozen(BORDER_STYLES)).toBe(true)
    for (const glyphs of Object.values(BORDER_STYLES)) {
      expect(Object.isFrozen(glyphs)).toBe(true)
    }
    expect(resolveTableConfig().glyphs).toBe(BORDER_STYLES.ascii)
  })

  it('recognizes preset names only', () => {
    expect(isBorderStyleName('double')).toBe(true)
    expect(isBorderStyleName('toString')).toBe(false)
  })
})
