/**
 * Core type definitions for the pendulum wave model.
 *
 * Renderer-agnostic: the raster renderer and the Ink app only read these.
 * No side effects on import.
 */

// ---------------------------------------------------------------------------
// Geometry and color
// ---------------------------------------------------------------------------

export interface Vec2 {
  readonly x: number
  readonly y: number
}

/** 8-bit display color, each channel an integer in [0, 255]. */
export interface RGB {
  readonly r: number
  readonly g: number
  readonly b: number
}

// ---------------------------------------------------------------------------
// Global tuning
// ---------------------------------------------------------------------------

/** Inputs of the per-index parameter derivation. */
export interface WaveConstants {
  /** Duration of one full wave cycle (seconds). */
  readonly totalPeriodS: number
  /** Full swings of the slowest pendulum over `totalPeriodS`. */
  readonly baseOscillations: number
  readonly oscillatorCount: number
  /** Gravitational acceleration (m/s²). */
  readonly gravity: number
  /** Drawable height in pixels. */
  readonly screenHeight: number
  /** Fraction of `screenHeight` taken by the longest pendulum. */
  readonly maxVisualLengthRatio: number
}

/** Derived, per-index values. */
export interface OscillatorParameters {
  readonly index: number
  readonly period: number
  readonly angularFrequency: number
  /** Small-angle pendulum length for `period` (meters). */
  readonly physicsLength: number
  readonly visualLength: number
  readonly colorRatio: number
}

// ---------------------------------------------------------------------------
// Oscillator
// ---------------------------------------------------------------------------

export interface OscillatorConfig {
  readonly index: number
  /** rad/s, > 0 */
  readonly angularFrequency: number
  /** pixels, > 0 */
  readonly visualLength: number
  /** Swing amplitude, shared across the row, in (0, π/2). */
  readonly amplitudeRad: number
  readonly pivotPoint: Vec2
  readonly color: RGB
  readonly outlineColor: RGB
  readonly bobRadius: number
}

export interface OscillatorState {
  readonly currentAngle: number
  readonly position: Vec2
}
