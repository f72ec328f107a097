/**
 * Gene-Pair Triage - public API
 *
 * @module triage
 */

export * from "./types";
export { validateRecord, rowIdentifier, parseNumeric, parseBooleanFlag } from "./validator";
export {
  assessStatistical,
  scoreStatistical,
  transformPValue,
  transformEffectSize,
  transformHeterogeneity,
  transformConsistency,
  transformEggerBias,
  transformPower,
} from "./statistical-score";
export { assessBiological, scoreBiological, BIOLOGICAL_UNAVAILABLE_STATEMENT } from "./biological-score";
export { scoreProgression, classifyProgression } from "./progression-signal";
export { fuse, assignTier } from "./fusion";
export { scoreRecord } from "./score-record";
export { renormalizeWeights } from "./scoring-math";
export { generateRationale, buildFactors, buildFallbackNarrative } from "./rationale";
export type { RationaleOptions } from "./rationale";
export { AiSdkRationaleClient, createRationaleClient, API_KEY_ENV_VAR } from "./llm";
export type { RationaleClient, CompletionOptions } from "./llm";
export { RationaleCircuitBreaker } from "./rationale-circuit-breaker";
export { processRecords, summarizeRun, formatSummaryOneLiner, RunAbortedError } from "./pipeline";
export type { ProcessOptions } from "./pipeline";
