/**
 * Integer rasterization primitives writing palette indices into a PixelGrid.
 *
 * Everything is clipped to `[0, width) x [0, height)`; later writes win.
 */

import { pixelKey, type PixelGrid } from './types'

export interface RasterBounds {
  width: number
  height: number
}

export function plot(
  grid: PixelGrid,
  bounds: RasterBounds,
  x: number,
  y: number,
  paletteIndex: number,
): void {
  if (x < 0 || y < 0 || x >= bounds.width || y >= bounds.height) return
  grid.set(pixelKey(x, y), paletteIndex)
}

/** Bresenham line between rounded endpoints, both inclusive. */
export function drawLine(
  grid: PixelGrid,
  bounds: RasterBounds,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  paletteIndex: number,
): void {
  let x = Math.round(x0)
  let y = Math.round(y0)
  const xEnd = Math.round(x1)
  const yEnd = Math.round(y1)

  const dx = Math.abs(xEnd - x)
  const dy = -Math.abs(yEnd - y)
  const sx = x < xEnd ? 1 : -1
  const sy = y < yEnd ? 1 : -1
  let err = dx + dy

  for (;;) {
    plot(grid, bounds, x, y, paletteIndex)
    if (x === xEnd && y === yEnd) break
    const e2 = 2 * err
    if (e2 >= dy) {
      err += dy
      x += sx
    }
    if (e2 <= dx) {
      err += dx
      y += sy
    }
  }
}

/** Disc of integer radius around the rounded center. */
export function fillCircle(
  grid: PixelGrid,
  bounds: RasterBounds,
  cx: number,
  cy: number,
  radius: number,
  paletteIndex: number,
): void {
  const x0 = Math.round(cx)
  const y0 = Math.round(cy)
  const r = Math.max(0, Math.round(radius))
  const r2 = r * r

  for (let dy = -r; dy <= r; dy++) {
    for (let dx = -r; dx <= r; dx++) {
      if (dx * dx + dy * dy <= r2) {
        plot(grid, bounds, x0 + dx, y0 + dy, paletteIndex)
      }
    }
  }
}

/** Ring of the given thickness on the inside edge of the disc. */
export function strokeCircle(
  grid: PixelGrid,
  bounds: RasterBounds,
  cx: number,
  cy: number,
  radius: number,
  thickness: number,
  paletteIndex: number,
): void {
  const x0 = Math.round(cx)
  const y0 = Math.round(cy)
  const r = Math.max(0, Math.round(radius))
  const inner = Math.max(0, r - thickness)
  const r2 = r * r
  const inner2 = inner * inner

  for (let dy = -r; dy <= r; dy++) {
    for (let dx = -r; dx <= r; dx++) {
      const d2 = dx * dx + dy * dy
      if (d2 <= r2 && d2 > inner2) {
        plot(grid, bounds, x0 + dx, y0 + dy, paletteIndex)
      }
    }
  }
}
