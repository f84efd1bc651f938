import { describe, expect, it, vi } from 'vitest'
import { AsciiTable, zeroPad } from '../index.ts'

const lines = (...rows: string[]) => rows.join('\n')

describe('AsciiTable', () => {
  it('renders with the default configuration', () => {
    const table = new AsciiTable(['Name', 'Age'])
      .addRow(['Alice', '30'])
      .addRow(['Bob', '25'])

    expect(table.render()).toBe(lines(
      '+-------+-----+',
      '| Name  | Age |',
      '+-------+-----+',
      '| Alice | 30  |',
      '| Bob   | 25  |',
      '+-------+-----+',
    ))
  })

  it('renders nothing without columns', () => {
    expect(new AsciiTable().addRow(['x']).render()).toBe('')
  })

  it('renders through toString', () => {
    const table = new AsciiTable(['A']).addRow(['1'])
    expect(`${table}`).toBe(table.render())
  })

  it('chains every setter', () => {
    const output = new AsciiTable(['A', 'B'])
      .addRows([['1', '2'], ['3', '4']])
      .border(true)
      .header(true)
      .horizontalRules('header')
      .verticalRules('all')
      .padding(1)
      .alignment('center')
      .render()

    expect(output).toBe(lines('+---+---+', '| A | B |', '+---+---+', '| 1 | 2 |', '| 3 | 4 |'))
  })

  it('uses custom padding', () => {
    const output = new AsciiTable(['A']).addRow(['X']).padding(3).render()
    expect(output).toBe(lines('+-------+', '|   A   |', '+-------+', '|   X   |', '+-------+'))
  })

  it('clamps negative padding to zero', () => {
    const output = new AsciiTable(['A']).addRow(['X']).padding(-4).render()
    expect(output).toBe(lines('+-+', '|A|', '+-+', '|X|', '+-+'))
  })

  it('centers the extra space to the right', () => {
    const output = new AsciiTable(['Wide']).addRow(['A']).alignment('center').render()
    expect(output.split('\n')[3]).toBe('|  A   |')
  })

  it('applies a column override over the default alignment', () => {
    const output = new AsciiTable(['Left', 'Right'])
      .addRow(['A', '1'])
      .alignment('right')
      .alignment('left', 'Left')
      .render()
    expect(output.split('\n')[3]).toBe('| A    |     1 |')
  })

  it('ignores overrides for labels that only exist on Object.prototype', () => {
    const output = new AsciiTable(['toString']).addRow(['x']).alignment('right').render()
    expect(output.split('\n')[3]).toBe('|        x |')
  })

  it('replaces columns and re-measures on the next render', () => {
    const table = new AsciiTable(['A']).addRow(['1'])
    table.columns(['Longer'])
    expect(table.render()).toBe(lines('+--------+', '| Longer |', '+--------+', '| 1      |', '+--------+'))
  })

  it('switches border styles', () => {
    const output = new AsciiTable(['A']).addRow(['1']).borderStyle('unicode').render()
    expect(output).toBe(lines('┼───┼', '│ A │', '┼───┼', '│ 1 │', '┼───┼'))
  })

  it('rejects unknown border styles', () => {
    expect(() => new AsciiTable(['A']).borderStyle('fancy')).toThrow(/Unknown border style: 'fancy'/)
  })

  it('overrides single glyphs', () => {
    const output = new AsciiTable(['A']).glyphs({ junction: '*' }).render()
    expect(output).toBe(lines('*---*', '| A |', '*---*', '*---*'))
  })

  it('rejects glyphs wider than one cell', () => {
    expect(() => new AsciiTable(['A']).glyphs({ horizontal: '==' })).toThrow(/Invalid horizontal glyph/)
    expect(() => new AsciiTable(['A']).glyphs({ vertical: '中' })).toThrow(/Invalid vertical glyph/)
    expect(() => new AsciiTable(['A']).glyphs({ junction: '' })).toThrow(/Invalid junction glyph/)
  })

  describe('sorting', () => {
    const people = () => new AsciiTable(['Name', 'Age'])
      .addRow(['Alice', '30'])
      .addRow(['Bob', '5'])
      .addRow(['Charlie', '100'])

    const names = (output: string) => output.split('\n').slice(3, -1).map(line => line.split('|')[1]?.trim())

    it('sorts numerically with zeroPad', () => {
      const output = people().sort({ column: 'Age', transform: zeroPad(5) }).render()
      expect(names(output)).toEqual(['Bob', 'Alice', 'Charlie'])
    })

    it('sorts descending', () => {
      const output = people().sort({ column: 'Name', order: 'descending' }).render()
      expect(names(output)).toEqual(['Charlie', 'Bob', 'Alice'])
    })

    it('restores insertion order after clearSort', () => {
      const output = people().sort({ column: 'Name', order: 'descending' }).clearSort().render()
      expect(names(output)).toEqual(['Alice', 'Bob', 'Charlie'])
    })

    it('keeps insertion order for an unknown column', () => {
      const onWarning = vi.fn()
      const output = new AsciiTable(['Name'])
        .addRow(['Charlie'])
        .addRow(['Alice'])
        .sort({ column: 'Nonexistent' })
        .onWarning(onWarning)
        .render()
      expect(names(output)).toEqual(['Charlie', 'Alice'])
      expect(onWarning).toHaveBeenCalledWith('Sort column "Nonexistent" not found in table columns')
    })

    it('runs the transform on every render', () => {
      const transform = vi.fn((s: string) => s)
      const table = people().sort({ column: 'Name', transform })
      const first = table.render()
      expect(table.render()).toBe(first)
      expect(transform).toHaveBeenCalledTimes(6)
    })

    it('keeps Unicode rows aligned after sorting', () => {
      const output = new AsciiTable(['Name', 'Emoji'])
        .addRow(['Charlie', '😢'])
        .addRow(['Alice', '😀'])
        .sort({ column: 'Name' })
        .render()
      expect(output.split('\n').slice(3, 5)).toEqual(['| Alice   | 😀    |', '| Charlie | 😢    |'])
    })
  })

  describe('row arity', () => {
    it('warns about mismatched rows and keeps them', () => {
      const onWarning = vi.fn()
      const table = new AsciiTable(['A', 'B']).onWarning(onWarning).addRow(['1']).addRow(['1', '2', '3'])
      expect(onWarning).toHaveBeenNthCalledWith(1, 'Row has 1 values but table has 2 columns')
      expect(onWarning).toHaveBeenNthCalledWith(2, 'Row has 3 values but table has 2 columns')
      expect(table.render()).toBe(lines('+---+---+', '| A | B |', '+---+---+', '| 1 |', '| 1 | 2 |', '+---+---+'))
    })

    it('does not warn before columns are set', () => {
      const onWarning = vi.fn()
      new AsciiTable().onWarning(onWarning).addRow(['1', '2'])
      expect(onWarning).not.toHaveBeenCalled()
    })
  })
})
