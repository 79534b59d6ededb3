/**
 * Named defaults for the wave.
 *
 * Pixel-unit values are given against a 1800x1000 reference screen and
 * rescaled by `fitToViewport()` to whatever the terminal offers.
 *
 * No side effects on import.
 */

import type { WaveConfig } from './types'

export const REFERENCE_SCREEN_WIDTH = 1800
export const REFERENCE_SCREEN_HEIGHT = 1000

export const DEFAULT_OSCILLATOR_COUNT = 25
export const DEFAULT_TOTAL_PERIOD_S = 60
export const DEFAULT_BASE_OSCILLATIONS = 50
export const DEFAULT_MAX_AMPLITUDE_DEG = 22
export const DEFAULT_BOB_RADIUS = 12
export const DEFAULT_PIVOT_RADIUS = 10
export const DEFAULT_PIVOT_OFFSET_Y = 50
export const STANDARD_GRAVITY = 9.81
/** The longest pendulum uses 80% of the screen height. */
export const DEFAULT_MAX_VISUAL_LENGTH_RATIO = 0.8
export const DEFAULT_SPEED_STEP = 1.2
export const DEFAULT_FRAME_RATE = 30

export const DEFAULT_WAVE_CONFIG: WaveConfig = {
  screenWidth: REFERENCE_SCREEN_WIDTH,
  screenHeight: REFERENCE_SCREEN_HEIGHT,
  oscillatorCount: DEFAULT_OSCILLATOR_COUNT,
  totalPeriodS: DEFAULT_TOTAL_PERIOD_S,
  baseOscillations: DEFAULT_BASE_OSCILLATIONS,
  maxAmplitudeDeg: DEFAULT_MAX_AMPLITUDE_DEG,
  bobRadius: DEFAULT_BOB_RADIUS,
  pivotRadius: DEFAULT_PIVOT_RADIUS,
  pivotOffsetY: DEFAULT_PIVOT_OFFSET_Y,
  gravity: STANDARD_GRAVITY,
  maxVisualLengthRatio: DEFAULT_MAX_VISUAL_LENGTH_RATIO,
  speedStep: DEFAULT_SPEED_STEP,
  frameRate: DEFAULT_FRAME_RATE,
  colors: {
    background: '#0f0f1e',
    pivot: '#c8c8c8',
    string: '#46465a',
  },
}
