/**
 * Root application component for the pendulum wave terminal UI.
 *
 * Data flow:
 *   Keys / resize -> SceneRunner.handle(intent) -> store + clock
 *   SceneRunner frame loop -> BrailleRasterizer -> PixelCanvas
 *   Frame snapshot -> Footer
 */

import React, { useCallback, useEffect } from "react";
import { Box, useApp } from "ink";
import { useStore } from "zustand";

import type { WaveConfig } from "@/lib/config/types.js";
import { intentForAction } from "@/lib/keys/bindings.js";
import type { SceneAction } from "@/lib/keys/types.js";
import type { SceneRunner } from "@/lib/pendulum/scene.js";
import type { BrailleRasterizer } from "@/lib/render/rasterizer.js";

import { useKeyBindings } from "./hooks/useKeyBindings.js";
import { PixelCanvas } from "./components/animation/PixelCanvas.js";
import { usePendulumScene } from "./components/animation/usePendulumScene.js";
import { Footer, FOOTER_HEIGHT } from "./components/layout/Footer.js";

export interface AppProps {
  runner: SceneRunner;
  rasterizer: BrailleRasterizer;
  config: WaveConfig;
}

// ---------------------------------------------------------------------------
// Root App
// ---------------------------------------------------------------------------

export function App({ runner, rasterizer, config }: AppProps) {
  const app = useApp();
  const { raster, snapshot } = usePendulumScene(runner, rasterizer);
  const viewport = useStore(runner.store, (s) => s.viewport);

  // -- Quit -----------------------------------------------------------------

  useEffect(() => runner.onQuit(() => app.exit()), [runner, app]);

  // -- Keys -----------------------------------------------------------------

  const onAction = useCallback(
    (action: SceneAction) => runner.handle(intentForAction(action)),
    [runner],
  );
  useKeyBindings(onAction);

  // -- Terminal resize --------------------------------------------------------

  useEffect(() => {
    const onResize = () => {
      runner.handle({
        type: "RESIZE",
        columns: process.stdout.columns ?? 80,
        rows: process.stdout.rows ?? 24,
      });
    };
    onResize();
    process.stdout.on("resize", onResize);
    return () => {
      process.stdout.off("resize", onResize);
    };
  }, [runner]);

  const columns = viewport?.columns;
  const canvasRows = viewport ? Math.max(1, viewport.rows - FOOTER_HEIGHT) : undefined;

  return (
    <Box flexDirection="column">
      <PixelCanvas
        frame={raster}
        background={config.colors.background}
        maxColumns={columns}
        maxRows={canvasRows}
      />
      <Footer
        snapshot={snapshot}
        totalPeriodS={config.totalPeriodS}
        width={columns ?? Math.ceil(config.screenWidth / 2)}
      />
    </Box>
  );
}
