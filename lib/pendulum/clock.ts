/**
 * Simulated-time accumulator.
 *
 * Scales real frame deltas by the current time scale and holds still while
 * paused. Negative scales run the phase backward.
 */

export type ClockState = 'running' | 'paused'

export class SimulationClock {
  private _total: number = 0
  private _state: ClockState = 'running'

  /**
   * Fold one frame of real time into the simulated total.
   *
   * Returns the new total. Throws RangeError when `realDeltaSeconds` is
   * negative or non-finite.
   */
  advance(realDeltaSeconds: number, timeScale: number, paused: boolean): number {
    if (!Number.isFinite(realDeltaSeconds) || realDeltaSeconds < 0) {
      throw new RangeError(`realDeltaSeconds must be a finite number >= 0, got ${realDeltaSeconds}`)
    }

    this._state = paused ? 'paused' : 'running'
    if (!paused) {
      this._total += realDeltaSeconds * timeScale
    }
    return this._total
  }

  reset(): void {
    this._total = 0
  }

  get totalSimTime(): number {
    return this._total
  }

  /** State observed on the most recent advance(). */
  get state(): ClockState {
    return this._state
  }
}
