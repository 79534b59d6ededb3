/**
 * Zustand store for scene controls.
 *
 * The reducer already uses Immer's produce() for immutable updates,
 * so the store itself does not need the immer middleware.
 *
 * One store per SceneRunner: the runner reads it every frame, Ink
 * components subscribe to it through `useStore`.
 */

import { createStore, type StoreApi } from "zustand";

import { DEFAULT_SPEED_STEP } from "@/lib/config/defaults";

import { reduce } from "./reducer";
import type { Intent, SceneControlState, SceneStore } from "./types";

// ---------------------------------------------------------------------------
// Initial state factory
// ---------------------------------------------------------------------------

export function createInitialControlState(
  overrides: Partial<SceneControlState> = {},
): SceneControlState {
  return {
    paused: false,
    timeScale: 1,
    speedStep: DEFAULT_SPEED_STEP,
    resetCount: 0,
    viewport: null,
    quitRequested: false,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Store creation
// ---------------------------------------------------------------------------

export type SceneStoreApi = StoreApi<SceneStore>;

export function createSceneStore(
  overrides: Partial<SceneControlState> = {},
): SceneStoreApi {
  return createStore<SceneStore>()((set, get) => ({
    ...createInitialControlState(overrides),

    dispatch: (intent: Intent) => {
      const nextState = reduce(selectControlState(get()), intent);
      set(nextState);
    },
  }));
}

/** Control fields only, without the dispatch function. */
export function selectControlState(store: SceneStore): SceneControlState {
  const { dispatch: _, ...state } = store;
  return state;
}

// Re-export types for convenience
export type { Intent, IntentType, SceneControlState, SceneStore } from "./types";
