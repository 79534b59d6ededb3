/**
 * Startup validation of the wave configuration.
 *
 * Every check throws ConfigurationError naming the offending key; the
 * derivation step adds its own checks for derived values.
 */

import { ConfigurationError } from '@/lib/pendulum/errors'
import { parseHexColor } from '@/lib/pendulum/color-ramp'

import type { WaveConfig } from './types'

function positive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(field, `expected a finite number > 0, got ${value}`)
  }
}

function nonNegative(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(field, `expected a finite number >= 0, got ${value}`)
  }
}

function integerAtLeast(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(field, `expected an integer >= ${min}, got ${value}`)
  }
}

function hexColor(field: string, value: string): void {
  if (parseHexColor(value) === null) {
    throw new ConfigurationError(field, `expected a "#rrggbb" color, got "${value}"`)
  }
}

/** Returns the config unchanged when valid. */
export function validateWaveConfig(config: WaveConfig): WaveConfig {
  positive('screenWidth', config.screenWidth)
  positive('screenHeight', config.screenHeight)
  integerAtLeast('oscillatorCount', config.oscillatorCount, 0)
  positive('totalPeriodS', config.totalPeriodS)
  integerAtLeast('baseOscillations', config.baseOscillations, 1)
  positive('gravity', config.gravity)
  positive('bobRadius', config.bobRadius)
  nonNegative('pivotRadius', config.pivotRadius)
  nonNegative('pivotOffsetY', config.pivotOffsetY)
  positive('frameRate', config.frameRate)

  if (
    !Number.isFinite(config.maxAmplitudeDeg) ||
    config.maxAmplitudeDeg <= 0 ||
    config.maxAmplitudeDeg >= 90
  ) {
    throw new ConfigurationError(
      'maxAmplitudeDeg',
      `expected an angle strictly between 0 and 90 degrees, got ${config.maxAmplitudeDeg}`,
    )
  }

  if (
    !Number.isFinite(config.maxVisualLengthRatio) ||
    config.maxVisualLengthRatio <= 0 ||
    config.maxVisualLengthRatio > 1
  ) {
    throw new ConfigurationError(
      'maxVisualLengthRatio',
      `expected a fraction in (0, 1], got ${config.maxVisualLengthRatio}`,
    )
  }

  if (!Number.isFinite(config.speedStep) || config.speedStep <= 1) {
    throw new ConfigurationError('speedStep', `expected a finite number > 1, got ${config.speedStep}`)
  }

  hexColor('colors.background', config.colors.background)
  hexColor('colors.pivot', config.colors.pivot)
  hexColor('colors.string', config.colors.string)

  return config
}
