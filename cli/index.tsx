/**
 * Entry point for the pendulum wave terminal application.
 *
 * Loads and validates the configuration, fits it to the terminal, builds the
 * scene, then hands it to Ink. Configuration problems stop the process here,
 * before anything is drawn.
 */

import React from "react";
import { render } from "ink";

import { fitToViewport } from "@/lib/config/viewport.js";
import { validateWaveConfig } from "@/lib/config/validate.js";
import { ConfigurationError } from "@/lib/pendulum/errors.js";
import { SceneRunner } from "@/lib/pendulum/scene.js";
import { BrailleRasterizer } from "@/lib/render/rasterizer.js";

import { App } from "./app.js";
import { FOOTER_HEIGHT } from "./components/layout/Footer.js";
import { loadWaveConfig } from "./lib/config-file.js";

function buildScene() {
  const config = validateWaveConfig(
    fitToViewport(loadWaveConfig(), {
      columns: process.stdout.columns ?? 80,
      rows: Math.max(1, (process.stdout.rows ?? 24) - FOOTER_HEIGHT),
    }),
  );
  const rasterizer = new BrailleRasterizer(config.colors);
  const runner = new SceneRunner(config, { renderer: rasterizer });
  return { config, rasterizer, runner };
}

let scene: ReturnType<typeof buildScene>;
try {
  scene = buildScene();
} catch (err) {
  if (err instanceof ConfigurationError) {
    console.error(`[config] ${err.message}`);
    process.exit(1);
  }
  throw err;
}

const { config, rasterizer, runner } = scene;

const { waitUntilExit } = render(
  <App runner={runner} rasterizer={rasterizer} config={config} />,
  { patchConsole: false },
);

waitUntilExit()
  .then(() => {
    runner.destroy();
    process.exit(0);
  })
  .catch((err: unknown) => {
    console.error("[scene] Terminated with an error:", err);
    runner.destroy();
    process.exit(1);
  });
