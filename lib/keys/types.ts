/**
 * Keyboard binding types for the pendulum wave TUI.
 */

/**
 * Scene control actions a key can trigger
 */
export type SceneAction =
  | 'toggle_pause'
  | 'reset'
  | 'speed_up'
  | 'speed_down'
  | 'quit'

/**
 * A single keyboard binding definition
 *
 * Bindings are pure data - they describe WHAT keys do, not HOW.
 * Actions become store intents through `intentForAction`.
 */
export interface KeyBinding {
  /** The key character or name ('q', 'upArrow', ' ', etc.) */
  key: string

  /** Requires Ctrl modifier */
  ctrl?: boolean

  /** Requires Shift modifier */
  shift?: boolean

  /** Requires Meta/Alt modifier */
  meta?: boolean

  /** Human-readable description for the status bar */
  description: string

  action: SceneAction

  /** Don't show in the status bar */
  hidden?: boolean
}

/**
 * Ink's useInput key input structure
 * Used for mapping between Ink and our binding system
 */
export interface InkKeyInput {
  upArrow: boolean
  downArrow: boolean
  leftArrow: boolean
  rightArrow: boolean
  return: boolean
  escape: boolean
  tab: boolean
  backspace: boolean
  delete: boolean
  pageUp: boolean
  pageDown: boolean
  ctrl: boolean
  shift: boolean
  meta: boolean
}

/**
 * Modifier keys that can be pressed with a key
 */
export interface KeyModifiers {
  ctrl?: boolean
  shift?: boolean
  meta?: boolean
}
