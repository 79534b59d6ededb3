/**
 * Frame-driven scene runner.
 *
 * Owns the oscillators, the simulation clock and the control store. Each
 * frame advances the clock, then updates every oscillator at the new total
 * time, then hands a snapshot to the renderer, in that order.
 *
 * The runner ticks on an interval (injectable for testing) and measures real
 * elapsed time with an injectable `now()`. frame() can also be called
 * directly for external timing control.
 *
 * No React and no terminal here.
 */

import type { WaveConfig } from '@/lib/config/types'
import { createSceneStore, type SceneStoreApi } from '@/lib/store'
import type { Intent } from '@/lib/store/types'

import { SimulationClock } from './clock'
import type { Oscillator } from './oscillator'
import { createOscillators, pivotPointFor } from './setup'
import type { RGB, Vec2 } from './types'

// ---------------------------------------------------------------------------
// Frame snapshot (read-only view handed to renderers)
// ---------------------------------------------------------------------------

export interface BobSnapshot {
  readonly index: number
  readonly angle: number
  readonly position: Vec2
  readonly radius: number
  readonly color: RGB
  readonly outlineColor: RGB
}

export interface FrameSnapshot {
  /** Frames produced since the runner was created. */
  readonly frame: number
  readonly totalSimTime: number
  readonly paused: boolean
  readonly timeScale: number
  readonly screen: { readonly width: number; readonly height: number }
  readonly pivot: Vec2
  readonly pivotRadius: number
  readonly bobs: readonly BobSnapshot[]
}

export interface SceneRenderer {
  render(snapshot: FrameSnapshot): void
}

type Listener<T> = (value: T) => void

/** Calls `callback` every `intervalMs`; returns a function that cancels it. */
export type IntervalScheduler = (callback: () => void, intervalMs: number) => () => void

const scheduleWithTimers: IntervalScheduler = (callback, intervalMs) => {
  const id = setInterval(callback, intervalMs)
  return () => clearInterval(id)
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export interface SceneRunnerOptions {
  renderer?: SceneRenderer
  store?: SceneStoreApi
  scheduleInterval?: IntervalScheduler
  /** Monotonic milliseconds. */
  now?: () => number
}

export class SceneRunner {
  private readonly _config: WaveConfig
  private readonly _oscillators: Oscillator[]
  private readonly _clock = new SimulationClock()
  private readonly _store: SceneStoreApi
  private readonly _pivot: Vec2
  private _renderer: SceneRenderer | null

  // Timing
  private _fps: number
  private _cancelTimer: (() => void) | null = null
  private _lastTickMs: number | null = null
  private _frame: number = 0

  private readonly _quitListeners = new Set<Listener<void>>()
  private readonly _frameListeners = new Set<Listener<FrameSnapshot>>()

  // Injectable timer for testing
  private _scheduleInterval: IntervalScheduler
  private _now: () => number

  constructor(config: WaveConfig, opts?: SceneRunnerOptions) {
    this._config = config
    this._oscillators = createOscillators(config)
    this._pivot = pivotPointFor(config)
    this._fps = config.frameRate
    this._renderer = opts?.renderer ?? null
    this._store = opts?.store ?? createSceneStore({ speedStep: config.speedStep })
    this._scheduleInterval = opts?.scheduleInterval ?? scheduleWithTimers
    this._now = opts?.now ?? (() => performance.now())
  }

  // -----------------------------------------------------------------------
  // Controls
  // -----------------------------------------------------------------------

  /** Apply one control intent. */
  handle(intent: Intent): void {
    this._store.getState().dispatch(intent)

    switch (intent.type) {
      case 'RESET':
        this._clock.reset()
        break
      case 'QUIT':
        this.stop()
        for (const listener of this._quitListeners) listener()
        break
      default:
        break
    }
  }

  onQuit(listener: () => void): () => void {
    this._quitListeners.add(listener)
    return () => {
      this._quitListeners.delete(listener)
    }
  }

  onFrame(listener: Listener<FrameSnapshot>): () => void {
    this._frameListeners.add(listener)
    return () => {
      this._frameListeners.delete(listener)
    }
  }

  // -----------------------------------------------------------------------
  // Frame update
  // -----------------------------------------------------------------------

  /**
   * Produce one frame from `realDeltaSeconds` of real time.
   *
   * Called automatically by the internal timer.
   */
  frame(realDeltaSeconds: number): FrameSnapshot {
    const { paused, timeScale } = this._store.getState()
    const totalSimTime = this._clock.advance(realDeltaSeconds, timeScale, paused)

    for (const oscillator of this._oscillators) {
      oscillator.update(totalSimTime)
    }

    this._frame++
    const snapshot = this.snapshot()
    this._renderer?.render(snapshot)
    for (const listener of this._frameListeners) listener(snapshot)
    return snapshot
  }

  /** One timer tick: measure the real delta since the previous tick. */
  tick(): FrameSnapshot {
    const nowMs = this._now()
    const deltaMs = this._lastTickMs === null ? 0 : Math.max(0, nowMs - this._lastTickMs)
    this._lastTickMs = nowMs
    return this.frame(deltaMs / 1000)
  }

  snapshot(): FrameSnapshot {
    const { paused, timeScale } = this._store.getState()
    return {
      frame: this._frame,
      totalSimTime: this._clock.totalSimTime,
      paused,
      timeScale,
      screen: { width: this._config.screenWidth, height: this._config.screenHeight },
      pivot: this._pivot,
      pivotRadius: this._config.pivotRadius,
      bobs: this._oscillators.map((osc) => ({
        index: osc.config.index,
        angle: osc.state.currentAngle,
        position: osc.position,
        radius: osc.radius,
        color: osc.color,
        outlineColor: osc.config.outlineColor,
      })),
    }
  }

  // -----------------------------------------------------------------------
  // Accessors
  // -----------------------------------------------------------------------

  get oscillators(): readonly Oscillator[] {
    return this._oscillators
  }

  get store(): SceneStoreApi {
    return this._store
  }

  get totalSimTime(): number {
    return this._clock.totalSimTime
  }

  get fps(): number {
    return this._fps
  }

  get isRunning(): boolean {
    return this._cancelTimer !== null
  }

  // -----------------------------------------------------------------------
  // Loop lifecycle
  // -----------------------------------------------------------------------

  /**
   * Set the frame-rate limit. A running timer is rescheduled; the time since
   * the last tick still reaches the clock on the next one.
   */
  setFPS(fps: number): void {
    this._fps = Math.max(1, fps)
    if (this._cancelTimer !== null) {
      this._cancelTimer()
      this._cancelTimer = this._schedule()
    }
  }

  /** Start ticking. Draws one frame immediately. */
  start(): void {
    if (this._cancelTimer !== null) return
    this._lastTickMs = null
    this.tick()
    this._cancelTimer = this._schedule()
  }

  /** Stop ticking. Clock and oscillators are preserved. */
  stop(): void {
    if (this._cancelTimer !== null) {
      this._cancelTimer()
      this._cancelTimer = null
    }
  }

  private _schedule(): () => void {
    return this._scheduleInterval(() => this.tick(), Math.round(1000 / this._fps))
  }

  /** Full teardown: stop timer, drop listeners and renderer. */
  destroy(): void {
    this.stop()
    this._quitListeners.clear()
    this._frameListeners.clear()
    this._renderer = null
  }
}
