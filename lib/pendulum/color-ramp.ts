/**
 * Red → green → blue ramp used to tint the bobs by their index.
 *
 * No side effects on import.
 */

import type { RGB } from './types'

const clamp = (v: number, lo: number, hi: number) =>
  Math.max(lo, Math.min(hi, v))

function toChannel(value: number): number {
  return clamp(Math.round(value * 255), 0, 255)
}

/**
 * Map a normalized index to a display color.
 *
 * Three-band piecewise-linear sweep: 0 is pure red, 0.5 pure green, 1 pure
 * blue. Ratios outside [0, 1] are clamped; NaN counts as 0.
 */
export function colorFromRatio(ratio: number): RGB {
  const t = Number.isNaN(ratio) ? 0 : clamp(ratio, 0, 1)

  const r = Math.max(0, 1 - 2 * t)
  const g = 1 - Math.abs(t - 0.5) * 2
  const b = Math.max(0, (t - 0.5) * 2)

  return { r: toChannel(r), g: toChannel(g), b: toChannel(b) }
}

/** Bob outline: every channel halved. */
export function outlineColor(color: RGB): RGB {
  return {
    r: Math.floor(color.r / 2),
    g: Math.floor(color.g / 2),
    b: Math.floor(color.b / 2),
  }
}

// ---------------------------------------------------------------------------
// Hex conversion
// ---------------------------------------------------------------------------

export function rgbToHex({ r, g, b }: RGB): string {
  return '#' + [r, g, b].map((c) => c.toString(16).padStart(2, '0')).join('')
}

const HEX_PATTERN = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i

/** Parse "#rrggbb". Returns null for anything else. */
export function parseHexColor(hex: string): RGB | null {
  const match = HEX_PATTERN.exec(hex.trim())
  if (!match) return null
  return {
    r: parseInt(match[1], 16),
    g: parseInt(match[2], 16),
    b: parseInt(match[3], 16),
  }
}
