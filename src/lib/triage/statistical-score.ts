/**
 * Statistical Credibility Scorer
 *
 * Converts six meta-analysis metrics into a 0-100 composite. Each metric has
 * an independent transform; the composite is a weighted average over the
 * metrics that are present, with the weights of absent optional metrics
 * redistributed proportionally (see `renormalizeWeights`).
 *
 * @module triage/statistical-score
 */

import type { ScoringConfig } from "../config-schemas";
import { clampScore, finalizeScore, renormalizeWeights } from "./scoring-math";
import type { GenePairRecord, MetricScore, StatisticalAssessment, StatisticalMetric } from "./types";

const METRIC_ORDER: readonly StatisticalMetric[] = [
  "pValue",
  "effectSize",
  "heterogeneity",
  "consistency",
  "bias",
  "power",
];

// ============================================================================
// TRANSFORMS
// ============================================================================

/** p == 0 is scored as the maximum rather than raising on log10(0). */
export function transformPValue(pValue: number, logScale: number): number {
  if (pValue <= 0) return 100;
  return clampScore((100 * -Math.log10(pValue)) / logScale);
}

export function transformEffectSize(effectSize: number, saturation: number): number {
  const magnitude = Math.abs(effectSize);
  if (magnitude >= saturation) return 100;
  return clampScore((100 * magnitude) / saturation);
}

export function transformHeterogeneity(iSquared: number, ceiling: number): number {
  return clampScore(100 * (1 - iSquared / ceiling));
}

export function transformConsistency(kappa: number): number {
  return clampScore(kappa * 100);
}

export function transformEggerBias(eggerP: number, alpha: number): number {
  return eggerP < alpha ? 0 : 100;
}

export function transformPower(powerScore: number): number {
  return clampScore(powerScore * 100);
}

// ============================================================================
// COMPOSITE
// ============================================================================

function metricInputs(record: GenePairRecord): Partial<Record<StatisticalMetric, number>> {
  return {
    pValue: record.pValue,
    effectSize: record.effectSize,
    heterogeneity: record.iSquared,
    consistency: record.kappa,
    bias: record.eggerP,
    power: record.powerScore,
  };
}

function transformMetric(metric: StatisticalMetric, input: number, config: ScoringConfig): number {
  const t = config.transforms;
  switch (metric) {
    case "pValue":
      return transformPValue(input, t.pValueLogScale);
    case "effectSize":
      return transformEffectSize(input, t.effectSizeSaturation);
    case "heterogeneity":
      return transformHeterogeneity(input, t.heterogeneityCeiling);
    case "consistency":
      return transformConsistency(input);
    case "bias":
      return transformEggerBias(input, t.eggerAlpha);
    case "power":
      return transformPower(input);
  }
}

/**
 * Full statistical assessment: per-metric sub-scores, effective weights and
 * the composite score.
 */
export function assessStatistical(record: GenePairRecord, config: ScoringConfig): StatisticalAssessment {
  const inputs = metricInputs(record);
  const present = METRIC_ORDER.filter((m) => inputs[m] !== undefined);
  const missingMetrics = METRIC_ORDER.filter((m) => inputs[m] === undefined);
  const weights = renormalizeWeights(config.statisticalWeights, present);

  const components: MetricScore[] = [];
  let composite = 0;
  for (const metric of present) {
    const input = inputs[metric];
    if (input === undefined) continue;
    const score = transformMetric(metric, input, config);
    const weight = weights.get(metric) ?? 0;
    composite += weight * score;
    components.push({ metric, input, score, weight });
  }

  return {
    score: finalizeScore(composite),
    components,
    missingMetrics,
  };
}

export function scoreStatistical(record: GenePairRecord, config: ScoringConfig): number {
  return assessStatistical(record, config).score;
}
