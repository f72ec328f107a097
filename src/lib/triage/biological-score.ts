/**
 * Biological Relevance Scorer
 *
 * Aggregates precomputed biological signals (interaction, phenotype, pathway
 * enrichment, expression) into a 0-100 score with a logistic ensemble. Each
 * present signal adds +w when its criterion holds and -w when it does not.
 * With no signal present the neutral score is returned and the assessment is
 * marked unavailable.
 *
 * @module triage/biological-score
 */

import type { ScoringConfig } from "../config-schemas";
import { finalizeScore, logistic } from "./scoring-math";
import type { BiologicalAssessment, GenePairRecord, SignalContribution } from "./types";

export const BIOLOGICAL_UNAVAILABLE_STATEMENT =
  "biological assessment unavailable — neutral score applied";

function signed(met: boolean, weight: number): number {
  return met ? weight : -weight;
}

export function collectSignals(record: GenePairRecord, config: ScoringConfig): SignalContribution[] {
  const bio = config.biological;
  const signals: SignalContribution[] = [];

  if (record.interactionFlag !== undefined) {
    const met = record.interactionFlag;
    signals.push({ signal: "interaction", met, logOdds: signed(met, bio.interactionLogOdds) });
  }
  if (record.phenotypeFlag !== undefined) {
    const met = bio.positivePhenotypes.includes(record.phenotypeFlag);
    signals.push({ signal: "phenotype", met, logOdds: signed(met, bio.phenotypeLogOdds) });
  }
  if (record.pathwayPValue !== undefined) {
    const met = record.pathwayPValue < bio.pathwaySignificance;
    signals.push({ signal: "pathway", met, logOdds: signed(met, bio.pathwayLogOdds) });
  }
  if (record.expressionZScore !== undefined) {
    const met = Math.abs(record.expressionZScore) > bio.expressionZThreshold;
    signals.push({ signal: "expression", met, logOdds: signed(met, bio.expressionLogOdds) });
  }

  return signals;
}

export function assessBiological(record: GenePairRecord, config: ScoringConfig): BiologicalAssessment {
  const contributions = collectSignals(record, config);
  if (contributions.length === 0) {
    return {
      score: finalizeScore(config.biological.neutralScore),
      available: false,
      contributions,
    };
  }

  const logOdds = contributions.reduce((acc, c) => acc + c.logOdds, config.biological.intercept);
  return {
    score: finalizeScore(100 * logistic(logOdds)),
    available: true,
    contributions,
  };
}

export function scoreBiological(record: GenePairRecord, config: ScoringConfig): number {
  return assessBiological(record, config).score;
}
