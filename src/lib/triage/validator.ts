/**
 * Row Validator
 *
 * Structural and range gate for a single input row. Invalid rows are a normal
 * return value (routed to quarantine by the caller), never an exception.
 *
 * Rules, in fixed order, all violations collected:
 *   1. missing_field:<name>    required field absent or blank
 *   2. range_violation:<name>  p_ss outside [0,1], i_squared outside [0,100],
 *                              n_studies below the profile minimum
 *   3. type_error:<name>       non-numeric value in a numeric field
 *
 * @module triage/validator
 */

import type { ScoringConfig } from "../config-schemas";
import type {
  GenePairRecord,
  RawGenePairRow,
  ValidationOutcome,
  ValidationReason,
} from "./types";

// ============================================================================
// FIELD TABLES
// ============================================================================

export const REQUIRED_FIELDS = ["pair_id", "p_ss", "dz_ss_mean", "confidence_score"] as const;

export const NUMERIC_FIELDS = [
  "p_ss",
  "dz_ss_mean",
  "confidence_score",
  "i_squared",
  "kappa",
  "egger_p",
  "power_score",
  "n_studies",
  "sepsis_correlation",
  "shock_correlation",
  "pathway_p_value",
  "expression_z_score",
] as const;

export type NumericField = (typeof NUMERIC_FIELDS)[number];

/** Legacy meta-analysis export column names. */
export const COLUMN_ALIASES: Readonly<Record<string, string>> = {
  i_squared: "dz_ss_i2",
  kappa: "kappa_ss",
  egger_p: "eggers_p_ss",
  n_studies: "n_studies_ss",
};

export const GENE_COLUMNS = ["gene_a_name", "gene_b_name"] as const;

const REQUIRED_NUMERIC = new Set<string>(REQUIRED_FIELDS);

// ============================================================================
// VALUE HELPERS
// ============================================================================

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

/** Read a column, falling back to its legacy alias when the canonical one is blank. */
export function readColumn(row: RawGenePairRow, name: string): unknown {
  const value = row[name];
  if (!isBlank(value)) return value;
  const alias = COLUMN_ALIASES[name];
  return alias ? row[alias] : value;
}

/** Parse a finite number from a number or numeric string; `null` when unparseable. */
export function parseNumeric(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

const TRUE_TOKENS = new Set(["true", "yes", "y", "1"]);
const FALSE_TOKENS = new Set(["false", "no", "n", "0"]);

export function parseBooleanFlag(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (value === 1) return true;
    if (value === 0) return false;
    return null;
  }
  if (typeof value === "string") {
    const token = value.trim().toLowerCase();
    if (TRUE_TOKENS.has(token)) return true;
    if (FALSE_TOKENS.has(token)) return false;
  }
  return null;
}

/**
 * Gene symbols are expected to be upper-case alphanumeric (hyphens and
 * underscores allowed), e.g. `IL6`, `HLA-DRA`.
 */
export function isSuspiciousGeneSymbol(symbol: string): boolean {
  const clean = symbol.trim().replace(/[-_]/g, "");
  if (!clean) return true;
  return !/^[A-Z0-9]+$/.test(clean) || !/[A-Z]/.test(clean);
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Validate one raw row against required fields and numeric bounds.
 * Pure: depends only on the row and the profile's nominal thresholds.
 */
export function validateRecord(row: RawGenePairRow, config: ScoringConfig): ValidationOutcome {
  const missing: ValidationReason[] = [];
  const rangeViolations: ValidationReason[] = [];
  const typeErrors: ValidationReason[] = [];
  const warnings: string[] = [];

  // Rule 1a: pair_id
  const rawPairId = row.pair_id;
  let pairId: string | null = null;
  if (typeof rawPairId === "string" && rawPairId.trim() !== "") {
    pairId = rawPairId.trim();
  } else if (typeof rawPairId === "number" && Number.isFinite(rawPairId)) {
    pairId = String(rawPairId);
  } else {
    missing.push("missing_field:pair_id");
  }

  // Rule 1b + 3: numeric presence and coercion
  const numbers: Partial<Record<NumericField, number>> = {};
  for (const field of NUMERIC_FIELDS) {
    const raw = readColumn(row, field);
    if (isBlank(raw)) {
      if (REQUIRED_NUMERIC.has(field)) missing.push(`missing_field:${field}`);
      continue;
    }
    const parsed = parseNumeric(raw);
    if (parsed === null) {
      typeErrors.push(`type_error:${field}`);
      continue;
    }
    numbers[field] = parsed;
  }

  // Rule 2: range gates (only on parsed values)
  const pValue = numbers.p_ss;
  if (pValue !== undefined && (pValue < 0 || pValue > 1)) {
    rangeViolations.push("range_violation:p_ss");
  }
  const iSquared = numbers.i_squared;
  if (iSquared !== undefined && (iSquared < 0 || iSquared > 100)) {
    rangeViolations.push("range_violation:i_squared");
  }
  const nStudies = numbers.n_studies;
  if (nStudies !== undefined && nStudies < config.thresholds.minStudies) {
    rangeViolations.push("range_violation:n_studies");
  }

  const reasons = [...missing, ...rangeViolations, ...typeErrors];
  if (
    reasons.length > 0 ||
    pairId === null ||
    numbers.p_ss === undefined ||
    numbers.dz_ss_mean === undefined ||
    numbers.confidence_score === undefined
  ) {
    return { valid: false, reasons };
  }

  // Non-blocking data-quality checks
  const genes: Partial<Record<(typeof GENE_COLUMNS)[number], string>> = {};
  for (const column of GENE_COLUMNS) {
    const value = row[column];
    const symbol = typeof value === "string" ? value.trim() : "";
    if (isSuspiciousGeneSymbol(symbol)) {
      warnings.push(`gene_symbol:${column}`);
    }
    if (symbol) genes[column] = symbol;
  }

  const readFlag = (column: string): boolean | undefined => {
    const value = row[column];
    if (isBlank(value)) return undefined;
    const flag = parseBooleanFlag(value);
    if (flag === null) {
      warnings.push(`unrecognised_flag:${column}`);
      return undefined;
    }
    return flag;
  };

  let phenotypeFlag: string | undefined;
  const rawPhenotype = row.phenotype_flag;
  if (typeof rawPhenotype === "string" && rawPhenotype.trim() !== "") {
    phenotypeFlag = rawPhenotype.trim().toLowerCase();
  } else if (!isBlank(rawPhenotype)) {
    warnings.push("unrecognised_flag:phenotype_flag");
  }

  const record: GenePairRecord = {
    pairId,
    geneA: genes.gene_a_name,
    geneB: genes.gene_b_name,
    pValue: numbers.p_ss,
    effectSize: numbers.dz_ss_mean,
    iSquared: numbers.i_squared,
    kappa: numbers.kappa,
    eggerP: numbers.egger_p,
    powerScore: numbers.power_score,
    nStudies: numbers.n_studies,
    sepsisCorrelation: numbers.sepsis_correlation,
    shockCorrelation: numbers.shock_correlation,
    priorConfidence: numbers.confidence_score,
    isStatisticallySound: readFlag("is_statistically_sound"),
    pathwayPValue: numbers.pathway_p_value,
    expressionZScore: numbers.expression_z_score,
    interactionFlag: readFlag("interaction_flag"),
    phenotypeFlag,
  };

  return { valid: true, record: Object.freeze(record), warnings };
}

/**
 * Best-effort identifier for a row, used for quarantine reporting even when
 * `pair_id` is missing or malformed.
 */
export function rowIdentifier(row: RawGenePairRow): string | null {
  const value = row.pair_id;
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}
