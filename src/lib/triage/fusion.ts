/**
 * Confidence Fusion & Triage
 *
 * The single authoritative classification point: combines the three
 * component scores with the configured fusion weights and maps the result
 * onto a tier. Lower cutoffs are inclusive.
 *
 * @module triage/fusion
 */

import type { ScoringConfig } from "../config-schemas";
import { finalizeScore } from "./scoring-math";
import type { FusionResult, Tier } from "./types";

export function assignTier(finalScore: number, config: ScoringConfig): Tier {
  if (finalScore >= config.tiers.greenMin) return "Green";
  if (finalScore >= config.tiers.amberMin) return "Amber";
  return "Red";
}

export function fuse(
  statistical: number,
  biological: number,
  progression: number,
  config: ScoringConfig,
): FusionResult {
  const w = config.fusionWeights;
  const finalScore = finalizeScore(
    w.statistical * statistical + w.biological * biological + w.progression * progression,
  );
  return { finalScore, tier: assignTier(finalScore, config) };
}
