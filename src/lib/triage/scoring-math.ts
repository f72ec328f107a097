/**
 * Shared numeric helpers for the scorers.
 *
 * @module triage/scoring-math
 */

export const SCORE_MIN = 0;
export const SCORE_MAX = 100;

/** Decimal places kept on every published score. */
const SCORE_DECIMALS = 6;

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return SCORE_MIN;
  return Math.max(SCORE_MIN, Math.min(SCORE_MAX, value));
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Clamp into [0,100] then round, so float noise never crosses a cutoff. */
export function finalizeScore(value: number): number {
  return roundTo(clampScore(value), SCORE_DECIMALS);
}

/**
 * Renormalise weights over the present keys: sum the remaining weights and
 * divide each by that sum. Absent keys are dropped. A zero total yields an
 * empty map.
 */
export function renormalizeWeights<K extends string>(
  weights: Readonly<Record<K, number>>,
  present: readonly K[],
): Map<K, number> {
  const total = present.reduce((acc, key) => acc + weights[key], 0);
  const normalized = new Map<K, number>();
  if (total <= 0) return normalized;
  for (const key of present) {
    normalized.set(key, weights[key] / total);
  }
  return normalized;
}

export function logistic(x: number): number {
  return 1 / (1 + Math.exp(-x));
}
