import { describe, it, expect, vi } from 'vitest'
import { DEFAULT_WAVE_CONFIG } from '@/lib/config/defaults'
import type { WaveConfig } from '@/lib/config/types'
import { validateWaveConfig } from '@/lib/config/validate'
import { oscillatorStateAt } from '@/lib/pendulum/oscillator'
import { SceneRunner, type FrameSnapshot, type SceneRenderer } from '@/lib/pendulum/scene'

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

function makeConfig(overrides?: Partial<WaveConfig>): WaveConfig {
  return validateWaveConfig({
    ...DEFAULT_WAVE_CONFIG,
    screenWidth: 200,
    screenHeight: 100,
    oscillatorCount: 3,
    bobRadius: 2,
    pivotRadius: 1,
    pivotOffsetY: 5,
    ...overrides,
  })
}

/** Scheduler that records the callback instead of starting a real timer. */
function makeScheduler() {
  const cancel = vi.fn()
  let callback: (() => void) | null = null
  const scheduleInterval = vi.fn((cb: () => void, _intervalMs: number) => {
    callback = cb
    return cancel
  })
  return {
    scheduleInterval,
    cancel,
    fire() {
      callback?.()
    },
  }
}

// ---------------------------------------------------------------------------
// Frames
// ---------------------------------------------------------------------------

describe('SceneRunner', () => {
  describe('frame', () => {
    it('should advance simulated time by the real delta', () => {
      const runner = new SceneRunner(makeConfig())
      const snapshot = runner.frame(0.5)
      expect(snapshot.totalSimTime).toBe(0.5)
      expect(snapshot.frame).toBe(1)
      expect(runner.totalSimTime).toBe(0.5)
    })

    it('should place every bob at its position for the new time', () => {
      const runner = new SceneRunner(makeConfig())
      const snapshot = runner.frame(0.75)
      expect(snapshot.bobs).toHaveLength(3)
      snapshot.bobs.forEach((bob, i) => {
        const expected = oscillatorStateAt(runner.oscillators[i].config, 0.75)
        expect(bob.position).toEqual(expected.position)
        expect(bob.angle).toBe(expected.currentAngle)
      })
    })

    it('should render after the clock and every oscillator have advanced', () => {
      const seen: Array<{ snapshot: FrameSnapshot; clock: number }> = []
      const renderer: SceneRenderer = {
        render: (snapshot) => {
          seen.push({ snapshot, clock: runner.totalSimTime })
        },
      }
      const runner = new SceneRunner(makeConfig(), { renderer })
      runner.frame(0.2)
      runner.frame(0.3)

      expect(seen).toHaveLength(2)
      const last = seen[1]
      expect(last.clock).toBe(0.5)
      expect(last.snapshot.totalSimTime).toBe(0.5)
      runner.oscillators.forEach((osc, i) => {
        expect(last.snapshot.bobs[i].position).toEqual(oscillatorStateAt(osc.config, 0.5).position)
      })
    })

    it('should notify frame listeners until they unsubscribe', () => {
      const runner = new SceneRunner(makeConfig())
      const listener = vi.fn()
      const unsubscribe = runner.onFrame(listener)
      runner.frame(0.1)
      unsubscribe()
      runner.frame(0.1)
      expect(listener).toHaveBeenCalledTimes(1)
    })

    it('should report the pivot and screen', () => {
      const snapshot = new SceneRunner(makeConfig()).frame(0)
      expect(snapshot.pivot).toEqual({ x: 100, y: 5 })
      expect(snapshot.pivotRadius).toBe(1)
      expect(snapshot.screen).toEqual({ width: 200, height: 100 })
    })

    it('should render only the pivot when there are no pendulums', () => {
      const snapshot = new SceneRunner(makeConfig({ oscillatorCount: 0 })).frame(1)
      expect(snapshot.bobs).toEqual([])
      expect(snapshot.totalSimTime).toBe(1)
    })
  })

  // -------------------------------------------------------------------------
  // Controls
  // -------------------------------------------------------------------------

  describe('controls', () => {
    it('should freeze time while paused', () => {
      const runner = new SceneRunner(makeConfig())
      runner.frame(1)
      runner.handle({ type: 'TOGGLE_PAUSE' })
      runner.frame(1)
      runner.frame(1)
      expect(runner.totalSimTime).toBe(1)
      expect(runner.snapshot().paused).toBe(true)

      runner.handle({ type: 'TOGGLE_PAUSE' })
      runner.frame(1)
      expect(runner.totalSimTime).toBe(2)
    })

    it('should speed up and slow down by the configured step', () => {
      const runner = new SceneRunner(makeConfig({ speedStep: 2 }))
      runner.handle({ type: 'SPEED_UP' })
      expect(runner.frame(1).totalSimTime).toBe(2)
      runner.handle({ type: 'SPEED_DOWN' })
      runner.handle({ type: 'SPEED_DOWN' })
      expect(runner.frame(1).timeScale).toBe(0.5)
      expect(runner.totalSimTime).toBe(2.5)
    })

    it('should rewind to zero on reset', () => {
      const runner = new SceneRunner(makeConfig())
      runner.frame(4)
      runner.handle({ type: 'RESET' })
      expect(runner.totalSimTime).toBe(0)
      expect(runner.frame(0.25).totalSimTime).toBe(0.25)
      expect(runner.store.getState().resetCount).toBe(1)
    })

    it('should put bobs back at their starting position after reset while paused', () => {
      const runner = new SceneRunner(makeConfig())
      const start = runner.frame(0).bobs.map((b) => b.position)
      runner.frame(3.3)
      runner.handle({ type: 'TOGGLE_PAUSE' })
      runner.handle({ type: 'RESET' })
      const after = runner.frame(0.5).bobs.map((b) => b.position)
      expect(after).toEqual(start)
    })

    it('should stop and notify on quit', () => {
      const scheduler = makeScheduler()
      const runner = new SceneRunner(makeConfig(), {
        scheduleInterval: scheduler.scheduleInterval,
        now: () => 0,
      })
      const onQuit = vi.fn()
      runner.onQuit(onQuit)
      runner.start()
      runner.handle({ type: 'QUIT' })

      expect(onQuit).toHaveBeenCalledTimes(1)
      expect(scheduler.cancel).toHaveBeenCalledTimes(1)
      expect(runner.isRunning).toBe(false)
      expect(runner.store.getState().quitRequested).toBe(true)
    })

    it('should record the viewport on resize', () => {
      const runner = new SceneRunner(makeConfig())
      runner.handle({ type: 'RESIZE', columns: 120, rows: 40 })
      expect(runner.store.getState().viewport).toEqual({ columns: 120, rows: 40 })
    })
  })

  // -------------------------------------------------------------------------
  // Loop lifecycle
  // -------------------------------------------------------------------------

  describe('loop', () => {
    it('should not be running initially', () => {
      expect(new SceneRunner(makeConfig()).isRunning).toBe(false)
    })

    it('should draw a frame immediately and schedule at the frame rate', () => {
      const scheduler = makeScheduler()
      const runner = new SceneRunner(makeConfig({ frameRate: 30 }), {
        scheduleInterval: scheduler.scheduleInterval,
        now: () => 0,
      })
      runner.start()

      expect(runner.isRunning).toBe(true)
      expect(runner.snapshot().frame).toBe(1)
      expect(runner.totalSimTime).toBe(0)
      expect(scheduler.scheduleInterval).toHaveBeenCalledWith(expect.any(Function), 33)
    })

    it('should not double-start', () => {
      const scheduler = makeScheduler()
      const runner = new SceneRunner(makeConfig(), {
        scheduleInterval: scheduler.scheduleInterval,
        now: () => 0,
      })
      runner.start()
      runner.start()
      expect(scheduler.scheduleInterval).toHaveBeenCalledTimes(1)
    })

    it('should measure real time between ticks', () => {
      const scheduler = makeScheduler()
      let nowMs = 1000
      const runner = new SceneRunner(makeConfig(), {
        scheduleInterval: scheduler.scheduleInterval,
        now: () => nowMs,
      })
      runner.start()
      nowMs = 1500
      scheduler.fire()
      expect(runner.totalSimTime).toBe(0.5)
      nowMs = 1750
      scheduler.fire()
      expect(runner.totalSimTime).toBe(0.75)
    })

    it('should cancel the timer on stop and keep the clock', () => {
      const scheduler = makeScheduler()
      let nowMs = 0
      const runner = new SceneRunner(makeConfig(), {
        scheduleInterval: scheduler.scheduleInterval,
        now: () => nowMs,
      })
      runner.start()
      nowMs = 2000
      scheduler.fire()
      runner.stop()

      expect(scheduler.cancel).toHaveBeenCalledTimes(1)
      expect(runner.isRunning).toBe(false)
      expect(runner.totalSimTime).toBe(2)
    })

    it('should reschedule when the frame rate changes while running', () => {
      const scheduler = makeScheduler()
      const runner = new SceneRunner(makeConfig(), {
        scheduleInterval: scheduler.scheduleInterval,
        now: () => 0,
      })
      runner.start()
      runner.setFPS(10)

      expect(runner.fps).toBe(10)
      expect(scheduler.cancel).toHaveBeenCalledTimes(1)
      expect(scheduler.scheduleInterval).toHaveBeenLastCalledWith(expect.any(Function), 100)
    })

    it('should keep the real time elapsed before a frame rate change', () => {
      const scheduler = makeScheduler()
      let nowMs = 0
      const runner = new SceneRunner(makeConfig(), {
        scheduleInterval: scheduler.scheduleInterval,
        now: () => nowMs,
      })
      runner.start()
      nowMs = 1000
      scheduler.fire()
      nowMs = 1030
      runner.setFPS(10)
      nowMs = 1130
      scheduler.fire()

      expect(runner.totalSimTime).toBeCloseTo(1.13, 9)
      expect(runner.snapshot().frame).toBe(3)
    })
  })
})
