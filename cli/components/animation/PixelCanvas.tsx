/**
 * Braille-character pixel renderer for the pendulum wave.
 *
 * Converts a RasterFrame into rows of Unicode braille characters, each
 * representing a 2x4 sub-pixel block, colored by the dominant palette index
 * of the cell. Rows are cropped to the current terminal size so a shrunken
 * window does not wrap.
 */

import React, { useMemo } from 'react'
import { Box, Text } from 'ink'

import { encodeBrailleRows } from '@/lib/render/braille.js'
import type { RasterFrame } from '@/lib/render/types.js'
import { hexColor, sceneBg } from '@/lib/theme/ink-colors.js'

export interface PixelCanvasProps {
  frame: RasterFrame
  /** Scene background hex color. */
  background: string
  /** Crop limits in terminal cells. */
  maxColumns?: number
  maxRows?: number
}

export function PixelCanvas({
  frame,
  background,
  maxColumns,
  maxRows,
}: PixelCanvasProps): React.ReactElement {
  const lines = useMemo(() => {
    const bg = sceneBg(background)
    const rows = encodeBrailleRows(frame).slice(0, maxRows)

    return rows.map((row) =>
      bg(
        row
          .slice(0, maxColumns)
          .map((cell) => {
            const hex = frame.palette[cell.paletteIndex]
            return hex === undefined ? cell.char : hexColor(hex)(cell.char)
          })
          .join(''),
      ),
    )
  }, [frame, background, maxColumns, maxRows])

  return (
    <Box flexDirection="column">
      {lines.map((line, i) => (
        <Text key={i} wrap="truncate">
          {line}
        </Text>
      ))}
    </Box>
  )
}
