/**
 * Pure reducer for scene controls.
 *
 * Uses Immer's produce() so handlers can write mutating syntax
 * while producing immutable snapshots.
 */

import { produce } from "immer";

import type { Intent, SceneControlState } from "./types";

export function reduce(state: SceneControlState, intent: Intent): SceneControlState {
  return produce(state, (draft) => {
    switch (intent.type) {
      // ---------------------------------------------------------------
      // TOGGLE_PAUSE
      // ---------------------------------------------------------------
      case "TOGGLE_PAUSE": {
        draft.paused = !draft.paused;
        return;
      }

      // ---------------------------------------------------------------
      // RESET (the clock itself lives in the SceneRunner)
      // ---------------------------------------------------------------
      case "RESET": {
        draft.resetCount += 1;
        return;
      }

      // ---------------------------------------------------------------
      // SPEED_UP / SPEED_DOWN
      // ---------------------------------------------------------------
      case "SPEED_UP": {
        draft.timeScale *= draft.speedStep;
        return;
      }

      case "SPEED_DOWN": {
        draft.timeScale /= draft.speedStep;
        return;
      }

      // ---------------------------------------------------------------
      // QUIT
      // ---------------------------------------------------------------
      case "QUIT": {
        draft.quitRequested = true;
        return;
      }

      // ---------------------------------------------------------------
      // RESIZE
      // ---------------------------------------------------------------
      case "RESIZE": {
        const { columns, rows } = intent;
        if (columns <= 0 || rows <= 0) return;
        draft.viewport = { columns, rows };
        return;
      }
    }
  });
}
