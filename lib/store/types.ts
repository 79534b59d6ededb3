/**
 * Scene control state and the Intent discriminated union.
 *
 * Intents are the only way input reaches the scene: key presses, terminal
 * resizes and programmatic controls all become one of these variants.
 */

import type { Viewport } from "@/lib/config/viewport";

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface SceneControlState {
  paused: boolean;
  /** Simulated seconds per real second. Negative runs the wave backward. */
  timeScale: number;
  /** Multiplier used by SPEED_UP / SPEED_DOWN. */
  speedStep: number;
  /** Number of RESET intents seen so far. */
  resetCount: number;
  viewport: Viewport | null;
  quitRequested: boolean;
}

// ---------------------------------------------------------------------------
// Intent types (discriminated union)
// ---------------------------------------------------------------------------

export interface TogglePauseIntent {
  type: "TOGGLE_PAUSE";
}

export interface ResetIntent {
  type: "RESET";
}

export interface SpeedUpIntent {
  type: "SPEED_UP";
}

export interface SpeedDownIntent {
  type: "SPEED_DOWN";
}

export interface QuitIntent {
  type: "QUIT";
}

export interface ResizeIntent {
  type: "RESIZE";
  columns: number;
  rows: number;
}

export type Intent =
  | TogglePauseIntent
  | ResetIntent
  | SpeedUpIntent
  | SpeedDownIntent
  | QuitIntent
  | ResizeIntent;

export type IntentType = Intent["type"];

// ---------------------------------------------------------------------------
// Store shape
// ---------------------------------------------------------------------------

export interface SceneStore extends SceneControlState {
  dispatch: (intent: Intent) => void;
}
