/**
 * Raster types shared by the rasterizer and the braille canvas.
 *
 * No side effects on import.
 */

// ---------------------------------------------------------------------------
// Pixel grid
// ---------------------------------------------------------------------------

/**
 * Maps pixel coordinates to palette indices.
 *
 * Key format: "x,y" (stringified for Map ergonomics).
 * Unset pixels are background.
 */
export type PixelGrid = Map<string, number>

export function pixelKey(x: number, y: number): string {
  return `${x},${y}`
}


// ---------------------------------------------------------------------------
// Frame
// ---------------------------------------------------------------------------

export interface RasterFrame {
  /** Pixel width (2 per terminal column). */
  width: number
  /** Pixel height (4 per terminal row). */
  height: number
  grid: PixelGrid
  /** Hex colors indexed by the values stored in `grid`. */
  palette: string[]
}

/** Fixed palette slots; per-oscillator colors follow. */
export const STRING_PALETTE_INDEX = 0
export const PIVOT_PALETTE_INDEX = 1
export const FIRST_BOB_PALETTE_INDEX = 2

export function bobFillIndex(bobIndex: number): number {
  return FIRST_BOB_PALETTE_INDEX + bobIndex * 2
}

export function bobOutlineIndex(bobIndex: number): number {
  return FIRST_BOB_PALETTE_INDEX + bobIndex * 2 + 1
}
