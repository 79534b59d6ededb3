/**
 * Complete keyboard binding map for the pendulum wave TUI
 *
 *   Space         pause / resume
 *   r             rewind to t = 0
 *   ↑ / →         speed up
 *   ↓ / ←         slow down
 *   Esc / q       quit
 */

import type { Intent } from '@/lib/store/types'

import type { KeyBinding, KeyModifiers, SceneAction } from './types'

/**
 * All keyboard bindings in the application
 */
export const BINDINGS: KeyBinding[] = [
  {
    key: ' ',
    description: 'Pause',
    action: 'toggle_pause',
  },
  {
    key: 'r',
    description: 'Reset',
    action: 'reset',
  },
  {
    key: 'upArrow',
    description: 'Faster',
    action: 'speed_up',
  },
  {
    key: 'rightArrow',
    description: 'Faster',
    action: 'speed_up',
    hidden: true, // Same as upArrow
  },
  {
    key: 'downArrow',
    description: 'Slower',
    action: 'speed_down',
  },
  {
    key: 'leftArrow',
    description: 'Slower',
    action: 'speed_down',
    hidden: true, // Same as downArrow
  },
  {
    key: 'escape',
    description: 'Quit',
    action: 'quit',
  },
  {
    key: 'q',
    description: 'Quit',
    action: 'quit',
    hidden: true,
  },
]

/**
 * Find a binding that matches the key and modifiers
 */
export function findBinding(
  key: string,
  modifiers: KeyModifiers = {}
): KeyBinding | undefined {
  return BINDINGS.find((binding) => {
    // Key must match exactly
    if (binding.key !== key) return false

    // Check modifiers (undefined/false are equivalent)
    const ctrlMatch = (binding.ctrl ?? false) === (modifiers.ctrl ?? false)
    const shiftMatch = (binding.shift ?? false) === (modifiers.shift ?? false)
    const metaMatch = (binding.meta ?? false) === (modifiers.meta ?? false)

    return ctrlMatch && shiftMatch && metaMatch
  })
}

/**
 * Status bar hints (non-hidden bindings only)
 */
export function getFooterHints(): Array<{ key: string; description: string }> {
  // Map special keys to readable names
  const keyMap: Record<string, string> = {
    upArrow: '↑',
    downArrow: '↓',
    leftArrow: '←',
    rightArrow: '→',
    escape: 'Esc',
    ' ': 'Space',
  }

  return BINDINGS.filter((binding) => !binding.hidden).map((binding) => {
    let displayKey = keyMap[binding.key] ?? binding.key
    if (binding.ctrl) displayKey = `Ctrl+${displayKey}`
    if (binding.shift) displayKey = `Shift+${displayKey}`
    if (binding.meta) displayKey = `Meta+${displayKey}`

    return { key: displayKey, description: binding.description }
  })
}

const ACTION_INTENTS: Record<SceneAction, Intent> = {
  toggle_pause: { type: 'TOGGLE_PAUSE' },
  reset: { type: 'RESET' },
  speed_up: { type: 'SPEED_UP' },
  speed_down: { type: 'SPEED_DOWN' },
  quit: { type: 'QUIT' },
}

/**
 * Control intent dispatched for a binding action
 */
export function intentForAction(action: SceneAction): Intent {
  return ACTION_INTENTS[action]
}
