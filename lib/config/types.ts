/**
 * Startup configuration surface.
 *
 * Read once when the app launches; nothing here is reconfigurable while the
 * wave runs.
 */

export interface WaveColors {
  /** Hex "#rrggbb" values. */
  readonly background: string
  readonly pivot: string
  readonly string: string
}

export interface WaveConfig {
  /** Drawable area in pixels (braille sub-dots in the terminal). */
  readonly screenWidth: number
  readonly screenHeight: number
  readonly oscillatorCount: number
  /** Re-convergence interval: every pendulum realigns after this many seconds. */
  readonly totalPeriodS: number
  /** Swings of the slowest pendulum per total period; higher packs the wave tighter. */
  readonly baseOscillations: number
  /** Bounds the swing angle of every pendulum. */
  readonly maxAmplitudeDeg: number
  readonly bobRadius: number
  readonly pivotRadius: number
  /** Distance of the pivot below the top edge, in pixels. */
  readonly pivotOffsetY: number
  readonly gravity: number
  readonly maxVisualLengthRatio: number
  /** Factor applied by speed-up and removed by speed-down. */
  readonly speedStep: number
  /** Frame-rate limit of the render loop. */
  readonly frameRate: number
  readonly colors: WaveColors
}

/** Per-key overrides as read from a config file. */
export type WaveConfigOverrides = Partial<Omit<WaveConfig, 'colors'>> & {
  colors?: Partial<WaveColors>
}
