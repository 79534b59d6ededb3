/**
 * Chalk formatters for the status bar and the braille canvas.
 *
 * Each mapper returns a `(text) => string`: `statusColor('paused')('PAUSED')`
 * gives an amber label. Chrome colors follow the theme mode; scene colors
 * come straight from the wave configuration.
 *
 * Requires chalk@5+ (ESM). No side effects on import.
 */

import chalk from 'chalk'

import { THEME_TOKENS, detectThemeMode, type ThemeMode, type ThemeTokens } from './tokens'

type Paint = (text: string) => string

// ---------------------------------------------------------------------------
// Mode
// ---------------------------------------------------------------------------

let _mode: ThemeMode | null = null

function tokens(): ThemeTokens {
  _mode ??= detectThemeMode()
  return THEME_TOKENS[_mode]
}

/** Re-read APPEARANCE_MODE on next use. */
export function resetThemeMode(): void {
  _mode = null
}

export function setThemeMode(mode: ThemeMode): void {
  _mode = mode
}

function fg(hex: string): Paint {
  return (text) => chalk.hex(hex)(text)
}

// ---------------------------------------------------------------------------
// Chrome
// ---------------------------------------------------------------------------

export type SceneStatus = keyof ThemeTokens['status']

export function statusColor(status: SceneStatus): Paint {
  return fg(tokens().status[status])
}

export function themeText(level: keyof ThemeTokens['text']): Paint {
  return fg(tokens().text[level])
}

/** Labels and key hints. */
export function statusBarFg(): Paint {
  return fg(tokens().statusBarFg)
}

export function separatorColor(): Paint {
  return fg(tokens().separator)
}

// ---------------------------------------------------------------------------
// Scene
// ---------------------------------------------------------------------------

/** Bob, string or pivot color. */
export function hexColor(hex: string): Paint {
  return fg(hex)
}

/** Scene background behind already-colored text. */
export function sceneBg(hex: string): Paint {
  return (text) => chalk.bgHex(hex)(text)
}
