import { describe, it, expect } from 'vitest'
import { encodeBrailleRows, encodeCell, toBraille } from '@/lib/render/braille'
import { pixelKey, type RasterFrame } from '@/lib/render/types'

function makeFrame(pixels: Array<[number, number, number]>, width = 4, height = 4): RasterFrame {
  const grid = new Map<string, number>()
  for (const [x, y, idx] of pixels) grid.set(pixelKey(x, y), idx)
  return { width, height, grid, palette: [] }
}

describe('toBraille', () => {
  it('should map an empty block to the blank pattern', () => {
    expect(toBraille([[false, false, false, false], [false, false, false, false]])).toBe('⠀')
  })

  it('should set dot 1 for the top-left sub-pixel', () => {
    expect(toBraille([[true, false, false, false], [false, false, false, false]])).toBe('⠁')
  })

  it('should set dots 7 and 8 for the bottom row', () => {
    expect(toBraille([[false, false, false, true], [false, false, false, true]])).toBe('⣀')
  })

  it('should fill every dot', () => {
    expect(toBraille([[true, true, true, true], [true, true, true, true]])).toBe('⣿')
  })
})

describe('encodeCell', () => {
  it('should color the cell by its most frequent index', () => {
    const frame = makeFrame([
      [0, 0, 5],
      [1, 0, 5],
      [0, 1, 7],
    ])
    expect(encodeCell(frame, 0, 0)).toEqual({ char: '⠋', paletteIndex: 5 })
  })

  it('should break ties by the first dot in column order', () => {
    const frame = makeFrame([
      [1, 0, 4],
      [0, 1, 3],
    ])
    expect(encodeCell(frame, 0, 0).paletteIndex).toBe(3)
  })

  it('should report -1 for an empty cell', () => {
    expect(encodeCell(makeFrame([]), 1, 0)).toEqual({ char: '⠀', paletteIndex: -1 })
  })

  it('should read the sub-pixels of its own block only', () => {
    const frame = makeFrame([[2, 4, 9]], 4, 8)
    expect(encodeCell(frame, 0, 0).paletteIndex).toBe(-1)
    expect(encodeCell(frame, 1, 1)).toEqual({ char: '⠁', paletteIndex: 9 })
  })
})

describe('encodeBrailleRows', () => {
  it('should round partial cells up', () => {
    const rows = encodeBrailleRows(makeFrame([], 5, 5))
    expect(rows).toHaveLength(2)
    expect(rows[0]).toHaveLength(3)
  })

  it('should produce no rows for an empty frame', () => {
    expect(encodeBrailleRows(makeFrame([], 0, 0))).toEqual([])
  })
})
