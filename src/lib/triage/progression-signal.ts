/**
 * Progression Signal Detector
 *
 * Scores the change in correlation from sepsis to septic shock and labels
 * the pattern.
 *
 * @module triage/progression-signal
 */

import type { ScoringConfig } from "../config-schemas";
import { finalizeScore, roundTo } from "./scoring-math";
import type { GenePairRecord, ProgressionPattern, ProgressionSignal } from "./types";

/** Delta precision; keeps 0.30 - 0.10 at exactly 0.2. */
const DELTA_DECIMALS = 10;

export function classifyProgression(delta: number, threshold: number): ProgressionPattern {
  if (delta >= threshold) return "amplification_positive";
  if (delta <= -threshold) return "attenuation_negative";
  return "stable";
}

export function scoreProgression(record: GenePairRecord, config: ScoringConfig): ProgressionSignal {
  const { sepsisCorrelation, shockCorrelation } = record;
  if (sepsisCorrelation === undefined || shockCorrelation === undefined) {
    return { score: 0, pattern: "stable", delta: 0, available: false };
  }

  const delta = roundTo(shockCorrelation - sepsisCorrelation, DELTA_DECIMALS);
  return {
    score: finalizeScore(Math.min(100, Math.abs(delta) * 100)),
    pattern: classifyProgression(delta, config.transforms.progressionDeltaThreshold),
    delta,
    available: true,
  };
}
