/**
 * Double-buffered rasterizer for pendulum wave frames.
 *
 * Each render() draws the pivot marker, then every pendulum's string and bob
 * into the back buffer, and swaps buffers atomically so readers of
 * getFrame() always see a complete frame.
 */

import type { WaveColors } from '@/lib/config/types'
import { rgbToHex } from '@/lib/pendulum/color-ramp'
import type { FrameSnapshot, SceneRenderer } from '@/lib/pendulum/scene'

import { drawLine, fillCircle, strokeCircle } from './raster'
import {
  bobFillIndex,
  bobOutlineIndex,
  PIVOT_PALETTE_INDEX,
  STRING_PALETTE_INDEX,
  type PixelGrid,
  type RasterFrame,
} from './types'

/** Bobs smaller than this get no outline ring. */
const MIN_OUTLINED_RADIUS = 2
const OUTLINE_THICKNESS = 1

export class BrailleRasterizer implements SceneRenderer {
  private _front: PixelGrid = new Map()
  private _back: PixelGrid = new Map()
  private _palette: string[]
  private _width: number = 0
  private _height: number = 0
  private _frames: number = 0

  private readonly _colors: WaveColors

  constructor(colors: WaveColors) {
    this._colors = colors
    this._palette = [colors.string, colors.pivot]
  }

  render(snapshot: FrameSnapshot): void {
    const bounds = { width: snapshot.screen.width, height: snapshot.screen.height }
    const back = this._back
    back.clear()

    const { pivot } = snapshot
    if (snapshot.pivotRadius > 0) {
      fillCircle(back, bounds, pivot.x, pivot.y, snapshot.pivotRadius, PIVOT_PALETTE_INDEX)
    }

    const palette = [this._colors.string, this._colors.pivot]
    snapshot.bobs.forEach((bob, i) => {
      const fill = bobFillIndex(i)
      const outline = bobOutlineIndex(i)
      palette[fill] = rgbToHex(bob.color)
      palette[outline] = rgbToHex(bob.outlineColor)

      drawLine(back, bounds, pivot.x, pivot.y, bob.position.x, bob.position.y, STRING_PALETTE_INDEX)
      fillCircle(back, bounds, bob.position.x, bob.position.y, bob.radius, fill)
      if (bob.radius >= MIN_OUTLINED_RADIUS) {
        strokeCircle(back, bounds, bob.position.x, bob.position.y, bob.radius, OUTLINE_THICKNESS, outline)
      }
    })

    // Atomic buffer swap
    this._back = this._front
    this._front = back
    this._palette = palette
    this._width = bounds.width
    this._height = bounds.height
    this._frames++
  }

  /** Most recently completed frame. Empty until the first render(). */
  getFrame(): RasterFrame {
    return {
      width: this._width,
      height: this._height,
      grid: this._front,
      palette: this._palette,
    }
  }

  /** Number of completed renders. */
  get frames(): number {
    return this._frames
  }
}
