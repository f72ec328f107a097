/**
 * Gene-Pair Triage - Core Types
 *
 * Record, outcome, score and rationale shapes shared by every pipeline stage.
 *
 * @module triage/types
 */

// ============================================================================
// INPUT RECORDS
// ============================================================================

/** One untyped input row keyed by column name (CSV header or caller-supplied). */
export type RawGenePairRow = Readonly<Record<string, unknown>>;

export type PhenotypeFlag = string;

/**
 * A validated, typed gene-pair record.
 * Optional metrics are `undefined` when the column was absent or blank.
 */
export interface GenePairRecord {
  readonly pairId: string;
  readonly geneA?: string;
  readonly geneB?: string;

  // Statistical meta-analysis fields
  readonly pValue: number;
  readonly effectSize: number;
  readonly iSquared?: number;
  readonly kappa?: number;
  readonly eggerP?: number;
  readonly powerScore?: number;
  readonly nStudies?: number;

  // Progression fields
  readonly sepsisCorrelation?: number;
  readonly shockCorrelation?: number;

  // Upstream confidence carried through for reporting
  readonly priorConfidence: number;
  readonly isStatisticallySound?: boolean;

  // Precomputed biological signals
  readonly pathwayPValue?: number;
  readonly expressionZScore?: number;
  readonly interactionFlag?: boolean;
  readonly phenotypeFlag?: PhenotypeFlag;
}

// ============================================================================
// VALIDATION
// ============================================================================

export type ValidationRule = "missing_field" | "range_violation" | "type_error";

/** Rule identifier such as `missing_field:pair_id` or `range_violation:p_ss`. */
export type ValidationReason = `${ValidationRule}:${string}`;

export interface ValidRecordOutcome {
  valid: true;
  record: GenePairRecord;
  /** Non-blocking data-quality notes, e.g. `gene_symbol:gene_a_name`. */
  warnings: string[];
}

export interface InvalidRecordOutcome {
  valid: false;
  reasons: ValidationReason[];
}

export type ValidationOutcome = ValidRecordOutcome | InvalidRecordOutcome;

// ============================================================================
// SCORING
// ============================================================================

export type Tier = "Green" | "Amber" | "Red";

export const TIERS: readonly Tier[] = ["Green", "Amber", "Red"] as const;

export type ProgressionPattern = "amplification_positive" | "attenuation_negative" | "stable";

export type StatisticalMetric = "pValue" | "effectSize" | "heterogeneity" | "consistency" | "bias" | "power";

export interface MetricScore {
  metric: StatisticalMetric;
  /** Raw input value the transform was applied to. */
  input: number;
  /** Transformed 0-100 sub-score. */
  score: number;
  /** Weight after renormalisation over the present metrics. */
  weight: number;
}

export interface StatisticalAssessment {
  score: number;
  components: MetricScore[];
  missingMetrics: StatisticalMetric[];
}

export type BiologicalSignal = "interaction" | "phenotype" | "pathway" | "expression";

export interface SignalContribution {
  signal: BiologicalSignal;
  met: boolean;
  logOdds: number;
}

export interface BiologicalAssessment {
  score: number;
  available: boolean;
  contributions: SignalContribution[];
}

export interface ProgressionSignal {
  score: number;
  pattern: ProgressionPattern;
  delta: number;
  available: boolean;
}

export interface FusionResult {
  finalScore: number;
  tier: Tier;
}

export interface ScoreBundle {
  readonly statisticalScore: number;
  readonly biologicalScore: number;
  readonly progressionScore: number;
  readonly progressionPattern: ProgressionPattern;
  readonly finalScore: number;
  readonly tier: Tier;
  readonly details: {
    readonly statistical: StatisticalAssessment;
    readonly biological: BiologicalAssessment;
    readonly progression: ProgressionSignal;
  };
}

// ============================================================================
// RATIONALE
// ============================================================================

export type FactorKey =
  | "p_value"
  | "effect_size"
  | "heterogeneity"
  | "consistency"
  | "publication_bias"
  | "power"
  | "study_count"
  | "biological"
  | "progression";

export interface RationaleFactor {
  key: FactorKey;
  label: string;
  value: number | null;
  threshold: number | null;
  /** `null` when the factor could not be assessed. */
  passed: boolean | null;
  statement: string;
}

export type NarrativeSource = "ai" | "fallback";

export type FallbackReason =
  | "disabled"
  | "no_client"
  | "circuit_open"
  | "timeout"
  | "network"
  | "auth"
  | "rate_limit"
  | "malformed_response";

export interface RationaleReport {
  pairId: string;
  tier: Tier;
  finalScore: number;
  factors: RationaleFactor[];
  statements: string[];
  notes: string[];
  narrative: string;
  narrativeSource: NarrativeSource;
  fallbackMode: boolean;
  fallbackReason: FallbackReason | null;
  biologicalAssessmentAvailable: boolean;
}

// ============================================================================
// PIPELINE OUTPUT
// ============================================================================

export interface ProcessedRow {
  index: number;
  recordId: string | null;
  outcome: ValidationOutcome;
  scores: ScoreBundle | null;
  rationale: RationaleReport | null;
}

export interface RunSummary {
  total: number;
  scored: number;
  quarantined: number;
  tierCounts: Record<Tier, number>;
  quarantineReasonCounts: Record<string, number>;
  fallbackNarratives: number;
  meanFinalScore: number;
  medianFinalScore: number;
}
