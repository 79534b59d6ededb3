/**
 * Design tokens for the status bar and key hints.
 *
 * Scene colors (background, pivot, strings) come from the wave
 * configuration; these tokens only cover the text chrome around it.
 *
 * No side effects on import.
 */

// ---------------------------------------------------------------------------
// Type definitions
// ---------------------------------------------------------------------------

export type ThemeMode = 'dark' | 'light'

export interface ThemeTokens {
  readonly text: {
    readonly primary: string
    readonly secondary: string
    readonly muted: string
  }
  readonly status: {
    readonly running: string
    readonly paused: string
    readonly reversed: string
  }
  readonly separator: string
  readonly statusBarFg: string
}

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

const DARK_TOKENS: ThemeTokens = {
  text: {
    primary: '#e4e4e4',
    secondary: '#a8a8a8',
    muted: '#6c6c6c',
  },
  status: {
    running: '#5faf5f',
    paused: '#d7af5f',
    reversed: '#87afd7',
  },
  separator: '#3a3a4a',
  statusBarFg: '#8a8a8a',
}

const LIGHT_TOKENS: ThemeTokens = {
  text: {
    primary: '#1c1c1c',
    secondary: '#4e4e4e',
    muted: '#8a8a8a',
  },
  status: {
    running: '#008700',
    paused: '#af8700',
    reversed: '#005faf',
  },
  separator: '#c6c6c6',
  statusBarFg: '#585858',
}

export const THEME_TOKENS: Record<ThemeMode, ThemeTokens> = {
  dark: DARK_TOKENS,
  light: LIGHT_TOKENS,
}

// ---------------------------------------------------------------------------
// Mode detection
// ---------------------------------------------------------------------------

/** APPEARANCE_MODE=light|dark, dark otherwise. */
export function detectThemeMode(): ThemeMode {
  const env = process.env.APPEARANCE_MODE?.trim().toLowerCase()
  if (env === 'light') return 'light'
  return 'dark'
}
