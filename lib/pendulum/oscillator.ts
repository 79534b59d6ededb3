/**
 * A single pendulum of the wave.
 *
 * Configuration is fixed by `setup()`; `update()` recomputes the bob
 * position from the total simulated time without integrating anything, so
 * rewinding the time (reset, negative speed) is always valid.
 */

import type { OscillatorConfig, OscillatorState, RGB, Vec2 } from './types'

/**
 * Angular displacement and bob position at `totalSimTime`.
 *
 * Exact simple harmonic angle, projected below the pivot with the angle
 * measured from vertical.
 */
export function oscillatorStateAt(
  config: OscillatorConfig,
  totalSimTime: number,
): OscillatorState {
  const currentAngle =
    config.amplitudeRad * Math.cos(config.angularFrequency * totalSimTime)

  return {
    currentAngle,
    position: {
      x: config.pivotPoint.x + config.visualLength * Math.sin(currentAngle),
      y: config.pivotPoint.y + config.visualLength * Math.cos(currentAngle),
    },
  }
}

export class Oscillator {
  private _config: OscillatorConfig | null = null
  private _state: OscillatorState | null = null

  /** One-time configuration. The config object is frozen. */
  setup(config: OscillatorConfig): void {
    if (this._config !== null) {
      throw new Error(`Oscillator ${this._config.index} is already set up`)
    }
    this._config = Object.freeze({
      ...config,
      pivotPoint: Object.freeze({ ...config.pivotPoint }),
      color: Object.freeze({ ...config.color }),
      outlineColor: Object.freeze({ ...config.outlineColor }),
    })
    this._state = oscillatorStateAt(this._config, 0)
  }

  update(totalSimTime: number): void {
    this._state = oscillatorStateAt(this.config, totalSimTime)
  }

  // -----------------------------------------------------------------------
  // Read-only accessors
  // -----------------------------------------------------------------------

  get config(): OscillatorConfig {
    if (this._config === null) {
      throw new Error('Oscillator used before setup()')
    }
    return this._config
  }

  get state(): OscillatorState {
    if (this._state === null) {
      throw new Error('Oscillator used before setup()')
    }
    return this._state
  }

  get position(): Vec2 {
    return this.state.position
  }

  get color(): RGB {
    return this.config.color
  }

  get radius(): number {
    return this.config.bobRadius
  }
}
