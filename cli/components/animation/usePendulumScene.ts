/**
 * React hook wiring a SceneRunner into the Ink render cycle.
 *
 * Starts the runner's frame loop on mount and stops it on unmount. After
 * every frame it copies the rasterizer's front buffer into React state, so
 * the consumer re-renders at the runner's frame rate.
 */

import { useEffect, useState } from 'react'

import type { FrameSnapshot, SceneRunner } from '@/lib/pendulum/scene.js'
import type { BrailleRasterizer } from '@/lib/render/rasterizer.js'
import type { RasterFrame } from '@/lib/render/types.js'

export interface UsePendulumSceneResult {
  raster: RasterFrame
  snapshot: FrameSnapshot
}

function copyFrame(frame: RasterFrame): RasterFrame {
  return { ...frame, grid: new Map(frame.grid), palette: [...frame.palette] }
}

export function usePendulumScene(
  runner: SceneRunner,
  rasterizer: BrailleRasterizer,
): UsePendulumSceneResult {
  const [state, setState] = useState<UsePendulumSceneResult>(() => ({
    raster: copyFrame(rasterizer.getFrame()),
    snapshot: runner.snapshot(),
  }))

  useEffect(() => {
    const unsubscribe = runner.onFrame((snapshot) => {
      setState({ raster: copyFrame(rasterizer.getFrame()), snapshot })
    })
    runner.start()

    return () => {
      unsubscribe()
      runner.stop()
    }
  }, [runner, rasterizer])

  return state
}
