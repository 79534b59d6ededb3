/**
 * Braille cell encoding for terminal rendering.
 *
 * Converts a PixelGrid into rows of Unicode braille characters, each
 * representing a 2x4 sub-pixel block. The dominant palette index within a
 * cell colors the whole character.
 */

import { pixelKey, type RasterFrame } from './types'

// ---------------------------------------------------------------------------
// Braille encoding
// ---------------------------------------------------------------------------

/**
 * Braille dot layout per terminal character cell (2 columns x 4 rows):
 *
 *   [dot1][dot4]     (0,0) (1,0)
 *   [dot2][dot5]     (0,1) (1,1)
 *   [dot3][dot6]     (0,2) (1,2)
 *   [dot7][dot8]     (0,3) (1,3)
 *
 * Unicode: 0x2800 + bit pattern
 */
const DOT_BITS: number[][] = [
  // [x][y] -> bit value
  [0x01, 0x02, 0x04, 0x40], // x=0: dots 1,2,3,7
  [0x08, 0x10, 0x20, 0x80], // x=1: dots 4,5,6,8
]

/** Convert a 2x4 dot array to a single braille character. */
export function toBraille(dots: boolean[][]): string {
  let code = 0x2800
  for (let x = 0; x < 2; x++) {
    for (let y = 0; y < 4; y++) {
      if (dots[x]?.[y]) {
        code |= DOT_BITS[x][y]
      }
    }
  }
  return String.fromCharCode(code)
}

// ---------------------------------------------------------------------------
// Cells
// ---------------------------------------------------------------------------

export interface BrailleCell {
  char: string
  /** Dominant palette index, or -1 for an empty cell. */
  paletteIndex: number
}

/**
 * Encode one terminal cell.
 *
 * Ties between palette indices go to the one seen first in dot order
 * (column-major, top to bottom).
 */
export function encodeCell(frame: RasterFrame, cellX: number, cellY: number): BrailleCell {
  const dots: boolean[][] = [
    [false, false, false, false],
    [false, false, false, false],
  ]
  const counts = new Map<number, number>()
  const pixelX = cellX * 2
  const pixelY = cellY * 4

  for (let dx = 0; dx < 2; dx++) {
    for (let dy = 0; dy < 4; dy++) {
      const idx = frame.grid.get(pixelKey(pixelX + dx, pixelY + dy))
      if (idx !== undefined && idx >= 0) {
        dots[dx][dy] = true
        counts.set(idx, (counts.get(idx) ?? 0) + 1)
      }
    }
  }

  let best = -1
  let bestCount = 0
  for (const [idx, count] of counts) {
    if (count > bestCount) {
      bestCount = count
      best = idx
    }
  }

  return { char: toBraille(dots), paletteIndex: best }
}

/** All cells of a frame, row by row. */
export function encodeBrailleRows(frame: RasterFrame): BrailleCell[][] {
  const cellCols = Math.ceil(frame.width / 2)
  const cellRows = Math.ceil(frame.height / 4)
  const rows: BrailleCell[][] = []

  for (let cy = 0; cy < cellRows; cy++) {
    const row: BrailleCell[] = []
    for (let cx = 0; cx < cellCols; cx++) {
      row.push(encodeCell(frame, cx, cy))
    }
    rows.push(row)
  }
  return rows
}
