/**
 * Status bar text formatting.
 */

/** "12.34s" (two decimals, sign kept for rewound time). */
export function formatSimTime(seconds: number): string {
  return `${seconds.toFixed(2)}s`
}

/** "×1.20" */
export function formatTimeScale(scale: number): string {
  return `×${scale.toFixed(2)}`
}

/**
 * Simulated seconds until every pendulum is back in phase.
 *
 * Realignment happens at every multiple of `totalPeriodS`; at an exact
 * multiple the answer is 0. With a negative time scale the next
 * realignment is the previous multiple, so `direction` < 0 counts down
 * toward it instead.
 */
export function timeToRealignment(
  totalSimTime: number,
  totalPeriodS: number,
  direction: number = 1,
): number {
  const phase = ((totalSimTime % totalPeriodS) + totalPeriodS) % totalPeriodS
  if (phase === 0) return 0
  return direction < 0 ? phase : totalPeriodS - phase
}
