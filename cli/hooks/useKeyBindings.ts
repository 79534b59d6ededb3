/**
 * Keyboard handler for the TUI.
 *
 * Bridges Ink's `useInput` hook with the declarative binding map from
 * `@/lib/keys/bindings.ts`. The caller receives the matched action name;
 * unbound keys are ignored.
 */

import { useInput } from "ink";

import { findBinding } from "@/lib/keys/bindings.js";
import type { InkKeyInput, KeyModifiers, SceneAction } from "@/lib/keys/types.js";

// ---------------------------------------------------------------------------
// Key name resolution
// ---------------------------------------------------------------------------

/**
 * Derive the canonical key name that our binding map uses from Ink's input
 * callback arguments.
 *
 * Ink delivers special keys via boolean flags on the `key` object and
 * printable characters via the `input` string.
 */
export function resolveKeyName(input: string, key: InkKeyInput): string {
  if (key.upArrow) return "upArrow";
  if (key.downArrow) return "downArrow";
  if (key.leftArrow) return "leftArrow";
  if (key.rightArrow) return "rightArrow";
  if (key.return) return "return";
  if (key.escape) return "escape";
  if (key.tab) return "tab";
  if (key.backspace) return "backspace";
  if (key.delete) return "delete";
  if (key.pageUp) return "pageUp";
  if (key.pageDown) return "pageDown";

  // Printable character (or space)
  return input;
}

/**
 * Modifier flags for a key event. Shift is implied by an uppercase letter;
 * Ink only flags it for some keys.
 */
export function resolveModifiers(input: string, key: InkKeyInput): KeyModifiers {
  return {
    ctrl: key.ctrl,
    shift: key.shift || (input.length === 1 && input >= "A" && input <= "Z"),
    meta: key.meta,
  };
}

// ---------------------------------------------------------------------------
// Hook
// ---------------------------------------------------------------------------

export function useKeyBindings(onAction: (action: SceneAction) => void): void {
  useInput((input: string, key: InkKeyInput) => {
    const keyName = resolveKeyName(input, key);
    if (!keyName) return;

    const binding = findBinding(keyName, resolveModifiers(input, key));
    if (!binding) return;

    onAction(binding.action);
  });
}
