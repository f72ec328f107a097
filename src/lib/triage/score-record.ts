/**
 * Builds the immutable ScoreBundle for a validated record.
 *
 * @module triage/score-record
 */

import { deepFreeze, type ScoringConfig } from "../config-schemas";
import { assessBiological } from "./biological-score";
import { fuse } from "./fusion";
import { scoreProgression } from "./progression-signal";
import { assessStatistical } from "./statistical-score";
import type { GenePairRecord, ScoreBundle } from "./types";

export function scoreRecord(record: GenePairRecord, config: ScoringConfig): ScoreBundle {
  // Independent scorers; evaluation order does not matter
  const statistical = assessStatistical(record, config);
  const biological = assessBiological(record, config);
  const progression = scoreProgression(record, config);
  const { finalScore, tier } = fuse(statistical.score, biological.score, progression.score, config);

  const bundle: ScoreBundle = {
    statisticalScore: statistical.score,
    biologicalScore: biological.score,
    progressionScore: progression.score,
    progressionPattern: progression.pattern,
    finalScore,
    tier,
    details: { statistical, biological, progression },
  };
  return deepFreeze(bundle);
}
