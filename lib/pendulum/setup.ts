/**
 * Build the row of oscillators from a validated WaveConfig.
 *
 * Runs once at startup. Derivation errors surface here as
 * ConfigurationError, before the first frame is drawn.
 */

import type { WaveConfig } from '@/lib/config/types'

import { colorFromRatio, outlineColor } from './color-ramp'
import { Oscillator } from './oscillator'
import { deriveAllParameters } from './parameters'
import type { OscillatorConfig, Vec2, WaveConstants } from './types'

export function degreesToRadians(deg: number): number {
  return deg * (Math.PI / 180)
}

export function toWaveConstants(config: WaveConfig): WaveConstants {
  return {
    totalPeriodS: config.totalPeriodS,
    baseOscillations: config.baseOscillations,
    oscillatorCount: config.oscillatorCount,
    gravity: config.gravity,
    screenHeight: config.screenHeight,
    maxVisualLengthRatio: config.maxVisualLengthRatio,
  }
}

/** Single overhead pivot, centred horizontally. */
export function pivotPointFor(config: WaveConfig): Vec2 {
  return { x: config.screenWidth / 2, y: config.pivotOffsetY }
}

export function buildOscillatorConfigs(config: WaveConfig): OscillatorConfig[] {
  const amplitudeRad = degreesToRadians(config.maxAmplitudeDeg)
  const pivotPoint = pivotPointFor(config)

  return deriveAllParameters(toWaveConstants(config)).map((params) => {
    const color = colorFromRatio(params.colorRatio)
    return {
      index: params.index,
      angularFrequency: params.angularFrequency,
      visualLength: params.visualLength,
      amplitudeRad,
      pivotPoint,
      color,
      outlineColor: outlineColor(color),
      bobRadius: config.bobRadius,
    }
  })
}

export function createOscillators(config: WaveConfig): Oscillator[] {
  return buildOscillatorConfigs(config).map((oscConfig) => {
    const oscillator = new Oscillator()
    oscillator.setup(oscConfig)
    return oscillator
  })
}
