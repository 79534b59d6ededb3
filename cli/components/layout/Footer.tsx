/**
 * Status bar rendered below the wave.
 *
 * Shows:
 * - Simulated time, speed and time to the next realignment
 * - Run state (running / paused / reversed)
 * - Key hints
 */

import React from "react";
import { Box, Text } from "ink";

import { getFooterHints } from "@/lib/keys/bindings.js";
import type { FrameSnapshot } from "@/lib/pendulum/scene.js";
import {
  separatorColor,
  statusBarFg,
  statusColor,
  themeText,
} from "@/lib/theme/ink-colors.js";
import { formatSimTime, formatTimeScale, timeToRealignment } from "@/lib/utils/format.js";

/** Separator + status line + hints. */
export const FOOTER_HEIGHT = 3;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface FooterProps {
  snapshot: FrameSnapshot;
  totalPeriodS: number;
  width: number;
}

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

export function Footer({ snapshot, totalPeriodS, width }: FooterProps) {
  const hints = getFooterHints();
  const fgFn = statusBarFg();
  const valueFn = themeText("primary");

  const status = snapshot.paused ? "paused" : snapshot.timeScale < 0 ? "reversed" : "running";
  const statusLabel = status.toUpperCase();
  const realign = timeToRealignment(snapshot.totalSimTime, totalPeriodS, snapshot.timeScale);

  return (
    <Box flexDirection="column">
      {/* Separator */}
      <Text>{separatorColor()("─".repeat(Math.max(0, width)))}</Text>

      {/* Status line */}
      <Box flexDirection="row" gap={2}>
        <Text>{statusColor(status)(`● ${statusLabel}`)}</Text>
        <Text>
          {fgFn("t")} {valueFn(formatSimTime(snapshot.totalSimTime))}
        </Text>
        <Text>
          {fgFn("speed")} {valueFn(formatTimeScale(snapshot.timeScale))}
        </Text>
        <Text>
          {fgFn("realign in")} {valueFn(formatSimTime(realign))}
        </Text>
        <Text>
          {fgFn("pendulums")} {valueFn(String(snapshot.bobs.length))}
        </Text>
      </Box>

      {/* Key hints */}
      <Box flexDirection="row" gap={1}>
        {hints.map((hint, i) => (
          <Text key={i}>
            {fgFn(`[${hint.key}]`)} <Text dimColor>{hint.description}</Text>
          </Text>
        ))}
      </Box>
    </Box>
  );
}
