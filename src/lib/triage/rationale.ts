/**
 * Rationale Generator
 *
 * Builds a deterministic, structured explanation for every scored record and
 * optionally asks the rationale service for a prose narrative. Any service
 * failure is converted into the deterministic template narrative; scores and
 * tier are never touched here.
 *
 * @module triage/rationale
 */

import type { AiSettings, ScoringConfig } from "../config-schemas";
import { ServiceError, classifyServiceError } from "../error-classification";
import { BIOLOGICAL_UNAVAILABLE_STATEMENT } from "./biological-score";
import { debugLog, errorLog, warnLog } from "./debug";
import type { RationaleClient } from "./llm";
import type { RationaleCircuitBreaker } from "./rationale-circuit-breaker";
import type {
  FallbackReason,
  GenePairRecord,
  MetricScore,
  RationaleFactor,
  RationaleReport,
  ScoreBundle,
  StatisticalMetric,
  Tier,
} from "./types";

// ============================================================================
// OPTIONS
// ============================================================================

export interface RationaleOptions {
  config: ScoringConfig;
  ai?: {
    settings: AiSettings;
    client?: RationaleClient;
    circuitBreaker?: RationaleCircuitBreaker;
  };
  /** Validator warnings for the record, surfaced as notes. */
  warnings?: readonly string[];
}

// ============================================================================
// FORMATTING
// ============================================================================

/** Three significant digits without trailing zeros (0.0004, 1.5e-7, 0.25). */
export function formatValue(value: number): string {
  return String(Number(value.toPrecision(3)));
}

export function formatScore(score: number): string {
  return score.toFixed(1);
}

function formatSigned(value: number): string {
  const text = formatValue(value);
  return value > 0 ? `+${text}` : text;
}

function verdict(passed: boolean): string {
  return passed ? "pass" : "fail";
}

const RECOMMENDATIONS: Record<Tier, string> = {
  Green: "proceed to validation",
  Amber: "manual review",
  Red: "reject",
};

const WARNING_NOTES: Record<string, string> = {
  "gene_symbol:gene_a_name": "Potential gene symbol issue in gene_a_name",
  "gene_symbol:gene_b_name": "Potential gene symbol issue in gene_b_name",
  "unrecognised_flag:interaction_flag": "Unrecognised interaction_flag value ignored",
  "unrecognised_flag:phenotype_flag": "Unrecognised phenotype_flag value ignored",
  "unrecognised_flag:is_statistically_sound": "Unrecognised is_statistically_sound value ignored",
};

// ============================================================================
// STRUCTURED FACTORS
// ============================================================================

function componentFor(components: MetricScore[], metric: StatisticalMetric): MetricScore | undefined {
  return components.find((c) => c.metric === metric);
}

function statisticalFactor(
  key: RationaleFactor["key"],
  label: string,
  value: number | undefined,
  threshold: number,
  comparator: "<=" | ">=",
  component: MetricScore | undefined,
): RationaleFactor {
  if (value === undefined) {
    return {
      key,
      label,
      value: null,
      threshold,
      passed: null,
      statement: `${label} not reported: excluded from the statistical composite`,
    };
  }
  const passed = comparator === "<=" ? value <= threshold : value >= threshold;
  const subScore = component ? `; sub-score ${formatScore(component.score)}` : "";
  return {
    key,
    label,
    value,
    threshold,
    passed,
    statement: `${label} ${formatValue(value)} (nominal ${comparator} ${formatValue(threshold)}): ${verdict(passed)}${subScore}`,
  };
}

/**
 * Deterministic factor list. Identical inputs always give identical output.
 */
export function buildFactors(record: GenePairRecord, bundle: ScoreBundle, config: ScoringConfig): RationaleFactor[] {
  const { statistical, biological, progression } = bundle.details;
  const components = statistical.components;
  const th = config.thresholds;

  const factors: RationaleFactor[] = [
    statisticalFactor("p_value", "P-value", record.pValue, th.maxPValue, "<=", componentFor(components, "pValue")),
    statisticalFactor(
      "effect_size",
      "|Cohen's d|",
      Math.abs(record.effectSize),
      th.minEffectSize,
      ">=",
      componentFor(components, "effectSize"),
    ),
    statisticalFactor("heterogeneity", "I²", record.iSquared, th.maxHeterogeneity, "<=", componentFor(components, "heterogeneity")),
    statisticalFactor("consistency", "Kappa", record.kappa, th.minKappa, ">=", componentFor(components, "consistency")),
    statisticalFactor(
      "publication_bias",
      "Egger p",
      record.eggerP,
      config.transforms.eggerAlpha,
      ">=",
      componentFor(components, "bias"),
    ),
    statisticalFactor("power", "Power", record.powerScore, th.minPowerScore, ">=", componentFor(components, "power")),
    statisticalFactor("study_count", "Studies", record.nStudies, th.minStudies, ">=", undefined),
  ];

  const neutral = config.biological.neutralScore;
  if (biological.available) {
    const passed = biological.score > neutral;
    const signals = biological.contributions
      .map((c) => `${c.signal}: ${c.met ? "met" : "not met"}`)
      .join(", ");
    factors.push({
      key: "biological",
      label: "Biological plausibility",
      value: biological.score,
      threshold: neutral,
      passed,
      statement: `Biological plausibility ${formatScore(biological.score)} from ${biological.contributions.length} signal(s) [${signals}] (nominal > ${formatValue(neutral)}): ${verdict(passed)}`,
    });
  } else {
    factors.push({
      key: "biological",
      label: "Biological plausibility",
      value: biological.score,
      threshold: neutral,
      passed: null,
      statement: `${BIOLOGICAL_UNAVAILABLE_STATEMENT} (${formatScore(biological.score)})`,
    });
  }

  const deltaThreshold = config.transforms.progressionDeltaThreshold;
  if (progression.available && record.sepsisCorrelation !== undefined && record.shockCorrelation !== undefined) {
    const passed = Math.abs(progression.delta) >= deltaThreshold;
    factors.push({
      key: "progression",
      label: "Progression signal",
      value: progression.delta,
      threshold: deltaThreshold,
      passed,
      statement:
        `Correlation delta ${formatSigned(progression.delta)} (sepsis ${formatValue(record.sepsisCorrelation)} → shock ${formatValue(record.shockCorrelation)}), ` +
        `pattern ${progression.pattern} (nominal |delta| >= ${formatValue(deltaThreshold)}): ${verdict(passed)}; score ${formatScore(progression.score)}`,
    });
  } else {
    factors.push({
      key: "progression",
      label: "Progression signal",
      value: null,
      threshold: deltaThreshold,
      passed: null,
      statement: "Progression signal unavailable: sepsis or shock correlation not reported",
    });
  }

  return factors;
}

export function buildNotes(record: GenePairRecord, bundle: ScoreBundle, warnings: readonly string[] = []): string[] {
  const notes: string[] = [];
  if (!bundle.details.biological.available) {
    notes.push(BIOLOGICAL_UNAVAILABLE_STATEMENT);
  }
  if (bundle.details.statistical.missingMetrics.length > 0) {
    notes.push(
      `Statistical weights renormalised over present metrics (missing: ${bundle.details.statistical.missingMetrics.join(", ")})`,
    );
  }
  if (record.isStatisticallySound === false) {
    notes.push("Upstream analysis flagged this pair as not statistically sound");
  }
  for (const warning of warnings) {
    notes.push(WARNING_NOTES[warning] ?? warning);
  }
  return notes;
}

// ============================================================================
// NARRATIVES
// ============================================================================

function describePair(record: GenePairRecord): string {
  if (record.geneA && record.geneB) return `Pair ${record.pairId} (${record.geneA} / ${record.geneB})`;
  return `Pair ${record.pairId}`;
}

function labelsWhere(factors: RationaleFactor[], passed: boolean | null): string {
  const labels = factors.filter((f) => f.passed === passed).map((f) => f.label);
  return labels.length > 0 ? labels.join(", ") : "none";
}

/**
 * Template narrative built only from the structured facts.
 */
export function buildFallbackNarrative(
  record: GenePairRecord,
  bundle: ScoreBundle,
  factors: RationaleFactor[],
): string {
  return [
    `${describePair(record)} is classified ${bundle.tier} with a final score of ${formatScore(bundle.finalScore)}.`,
    `Statistical credibility ${formatScore(bundle.statisticalScore)}, biological plausibility ${formatScore(bundle.biologicalScore)}, ` +
      `progression signal ${formatScore(bundle.progressionScore)} (${bundle.progressionPattern}).`,
    `Passed: ${labelsWhere(factors, true)}. Failed: ${labelsWhere(factors, false)}. Not assessed: ${labelsWhere(factors, null)}.`,
    `Recommendation: ${RECOMMENDATIONS[bundle.tier]}.`,
  ].join("\n");
}

const NARRATIVE_SYSTEM_PROMPT =
  "You are an expert sepsis biomarker analyst. Summarise statistical validity, biological plausibility " +
  "and clinical trajectory, and give a clear recommendation with next steps. " +
  "The tier and scores are final: explain them, never change them.";

export function buildNarrativePrompt(record: GenePairRecord, bundle: ScoreBundle, factors: RationaleFactor[]): string {
  const lines = [
    "Write a concise rationale for the following gene pair triage result.",
    `Pair ID: ${record.pairId}`,
    `Genes: ${record.geneA ?? "unknown"} vs ${record.geneB ?? "unknown"}`,
    `Tier: ${bundle.tier}`,
    `Final score: ${formatScore(bundle.finalScore)}`,
    `Statistical score: ${formatScore(bundle.statisticalScore)}`,
    `Biological score: ${formatScore(bundle.biologicalScore)}`,
    `Progression score: ${formatScore(bundle.progressionScore)} (${bundle.progressionPattern})`,
    "Factors:",
    ...factors.map((f) => `- ${f.statement}`),
    `Recommendation category: ${RECOMMENDATIONS[bundle.tier]}`,
  ];
  return lines.join("\n");
}

type NarrativeResult = { ok: true; text: string } | { ok: false; reason: FallbackReason };

async function completeWithTimeout(client: RationaleClient, prompt: string, settings: AiSettings): Promise<string> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ServiceError(`Rationale request timed out after ${settings.timeoutMs}ms`, "timeout"));
    }, settings.timeoutMs);
  });

  try {
    const text = await Promise.race([
      client.complete(prompt, settings.maxTokens, settings.temperature, {
        signal: controller.signal,
        system: NARRATIVE_SYSTEM_PROMPT,
      }),
      timeout,
    ]);
    if (typeof text !== "string" || !text.trim()) {
      throw new ServiceError("Empty or non-text response from rationale service", "malformed_response");
    }
    return text.trim();
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Request a narrative with bounded retries.
 */
async function requestNarrative(
  pairId: string,
  prompt: string,
  client: RationaleClient,
  settings: AiSettings,
  circuitBreaker?: RationaleCircuitBreaker,
): Promise<NarrativeResult> {
  if (circuitBreaker && !circuitBreaker.tryAcquire()) {
    debugLog(`[Rationale] ${pairId}: circuit open, using fallback narrative`);
    return { ok: false, reason: "circuit_open" };
  }

  let lastError: ServiceError | null = null;
  for (let attempt = 0; attempt <= settings.retryAttempts; attempt++) {
    try {
      const text = await completeWithTimeout(client, prompt, settings);
      circuitBreaker?.recordSuccess();
      return { ok: true, text };
    } catch (error) {
      lastError = classifyServiceError(error);
      warnLog(`[Rationale] ${pairId}: narrative request failed on attempt ${attempt + 1} (${lastError.kind}): ${lastError.message}`);
      if (!lastError.retriable || attempt >= settings.retryAttempts) break;
      if (settings.retryDelayMs > 0) {
        await new Promise((r) => setTimeout(r, settings.retryDelayMs * (attempt + 1)));
      }
    }
  }

  circuitBreaker?.recordFailure();
  return { ok: false, reason: lastError?.kind ?? "network" };
}

// ============================================================================
// GENERATOR
// ============================================================================

/**
 * Produce the rationale report for a scored record.
 * The structured part never depends on the rationale service.
 */
export async function generateRationale(
  record: GenePairRecord,
  bundle: ScoreBundle,
  options: RationaleOptions,
): Promise<RationaleReport> {
  const factors = buildFactors(record, bundle, options.config);
  const base = {
    pairId: record.pairId,
    tier: bundle.tier,
    finalScore: bundle.finalScore,
    factors,
    statements: factors.map((f) => f.statement),
    notes: buildNotes(record, bundle, options.warnings),
    biologicalAssessmentAvailable: bundle.details.biological.available,
  };

  const fallback = (reason: FallbackReason): RationaleReport => ({
    ...base,
    narrative: buildFallbackNarrative(record, bundle, factors),
    narrativeSource: "fallback",
    fallbackMode: true,
    fallbackReason: reason,
  });

  const ai = options.ai;
  if (!ai || !ai.settings.enabled) return fallback("disabled");
  if (!ai.client) return fallback("no_client");

  const prompt = buildNarrativePrompt(record, bundle, factors);
  let result: NarrativeResult;
  try {
    result = await requestNarrative(record.pairId, prompt, ai.client, ai.settings, ai.circuitBreaker);
  } catch (error) {
    const reason = classifyServiceError(error);
    errorLog(`[Rationale] ${record.pairId}: unexpected narrative failure (${reason.message}), using fallback narrative`);
    return fallback("network");
  }
  if (!result.ok) return fallback(result.reason);

  return {
    ...base,
    narrative: result.text,
    narrativeSource: "ai",
    fallbackMode: false,
    fallbackReason: null,
  };
}
