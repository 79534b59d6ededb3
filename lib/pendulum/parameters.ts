/**
 * Per-oscillator parameter derivation.
 *
 * Oscillator `i` completes `baseOscillations + i` full swings over
 * `totalPeriodS`, so every pendulum is back at its starting phase when the
 * total period elapses. Lengths come from the small-angle period formula and
 * are scaled so the slowest (longest) pendulum spans the configured fraction
 * of the screen height.
 *
 * Pure functions; each index is computed independently.
 */

import { ConfigurationError } from './errors'
import type { OscillatorParameters, WaveConstants } from './types'

const TWO_PI = 2 * Math.PI

function requireFinitePositive(field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(field, `derived value ${value} is not a finite positive number`)
  }
  return value
}

// ---------------------------------------------------------------------------
// Scalar steps
// ---------------------------------------------------------------------------

/** Period of oscillator `index` in seconds. */
export function derivePeriod(constants: WaveConstants, index: number): number {
  return constants.totalPeriodS / (constants.baseOscillations + index)
}

/** Pendulum length (meters) whose small-angle period is `period`. */
export function physicsLengthForPeriod(gravity: number, period: number): number {
  return gravity * Math.pow(period / TWO_PI, 2)
}

/**
 * Screen scale shared by the whole row, fixed by the longest period
 * (index 0) so that pendulum takes `maxVisualLengthRatio` of the height.
 */
export function derivePixelsPerMeter(constants: WaveConstants): number {
  const longestLength = physicsLengthForPeriod(
    constants.gravity,
    derivePeriod(constants, 0),
  )
  return requireFinitePositive(
    'pixelsPerMeter',
    (constants.screenHeight * constants.maxVisualLengthRatio) / longestLength,
  )
}

/** `i / (N - 1)`, or 0 for a single oscillator. */
export function deriveColorRatio(index: number, count: number): number {
  if (count <= 1) return 0
  return index / (count - 1)
}

// ---------------------------------------------------------------------------
// Per-index derivation
// ---------------------------------------------------------------------------

export function deriveOscillatorParameters(
  constants: WaveConstants,
  index: number,
  pixelsPerMeter: number = derivePixelsPerMeter(constants),
): OscillatorParameters {
  const period = requireFinitePositive('period', derivePeriod(constants, index))
  const angularFrequency = requireFinitePositive('angularFrequency', TWO_PI / period)
  const physicsLength = requireFinitePositive(
    'physicsLength',
    physicsLengthForPeriod(constants.gravity, period),
  )
  const visualLength = requireFinitePositive('visualLength', physicsLength * pixelsPerMeter)

  return {
    index,
    period,
    angularFrequency,
    physicsLength,
    visualLength,
    colorRatio: deriveColorRatio(index, constants.oscillatorCount),
  }
}

/** Parameters for every index in `[0, oscillatorCount)`. */
export function deriveAllParameters(constants: WaveConstants): OscillatorParameters[] {
  const pixelsPerMeter = derivePixelsPerMeter(constants)
  const result: OscillatorParameters[] = []
  for (let i = 0; i < constants.oscillatorCount; i++) {
    result.push(deriveOscillatorParameters(constants, i, pixelsPerMeter))
  }
  return result
}
