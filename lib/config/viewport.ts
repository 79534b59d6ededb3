/**
 * Fit the reference-sized configuration into a terminal viewport.
 *
 * A terminal cell holds a 2x4 braille dot block, so a viewport of
 * `columns` x `rows` cells offers `2*columns` x `4*rows` pixels. Pixel-unit
 * settings (bob radius, pivot marker, pivot offset) scale with the height.
 */

import type { WaveConfig } from './types'

export const BRAILLE_DOTS_X = 2
export const BRAILLE_DOTS_Y = 4

export interface Viewport {
  columns: number
  rows: number
}

export function viewportPixels(viewport: Viewport): { width: number; height: number } {
  return {
    width: Math.max(1, viewport.columns) * BRAILLE_DOTS_X,
    height: Math.max(1, viewport.rows) * BRAILLE_DOTS_Y,
  }
}

export function fitToViewport(config: WaveConfig, viewport: Viewport): WaveConfig {
  const { width, height } = viewportPixels(viewport)
  const scale = height / config.screenHeight

  return {
    ...config,
    screenWidth: width,
    screenHeight: height,
    bobRadius: Math.max(1, Math.round(config.bobRadius * scale)),
    pivotRadius: config.pivotRadius > 0 ? Math.max(1, Math.round(config.pivotRadius * scale)) : 0,
    pivotOffsetY: Math.round(config.pivotOffsetY * scale),
  }
}
