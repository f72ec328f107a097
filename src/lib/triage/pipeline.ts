/**
 * Gene-Pair Triage Pipeline
 *
 * validate → score → fuse → rationale, independently per row with bounded
 * concurrency. Results come back in input order whatever the completion
 * order. Only ConfigurationError (and caller cancellation) aborts a run;
 * per-row problems are captured in the row's own outcome.
 *
 * @module triage/pipeline
 */

import pLimit from "p-limit";

import { resolveAppConfig, type AppConfig } from "../config-schemas";
import { infoLog } from "./debug";
import type { RationaleClient } from "./llm";
import { generateRationale } from "./rationale";
import { RationaleCircuitBreaker } from "./rationale-circuit-breaker";
import { scoreRecord } from "./score-record";
import { TIERS, type ProcessedRow, type RawGenePairRow, type RunSummary, type Tier } from "./types";
import { rowIdentifier, validateRecord } from "./validator";

// ============================================================================
// TYPES
// ============================================================================

export interface ProcessOptions {
  /** Optional narrative capability; absent = deterministic narratives only. */
  aiClient?: RationaleClient;
  /** Overrides `config.concurrency`. */
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Raised when the caller aborts a run. `completedRows` holds only rows that
 * were fully processed, in input order.
 */
export class RunAbortedError extends Error {
  constructor(public readonly completedRows: ProcessedRow[]) {
    super(`Triage run aborted after ${completedRows.length} row(s)`);
    this.name = "RunAbortedError";
  }
}

// ============================================================================
// PROCESSING
// ============================================================================

async function processRow(
  row: RawGenePairRow,
  index: number,
  config: AppConfig,
  aiClient: RationaleClient | undefined,
  circuitBreaker: RationaleCircuitBreaker,
): Promise<ProcessedRow> {
  const outcome = validateRecord(row, config.scoring);
  if (!outcome.valid) {
    return { index, recordId: rowIdentifier(row), outcome, scores: null, rationale: null };
  }

  const scores = scoreRecord(outcome.record, config.scoring);
  const rationale = await generateRationale(outcome.record, scores, {
    config: config.scoring,
    ai: { settings: config.ai, client: aiClient, circuitBreaker },
    warnings: outcome.warnings,
  });

  return { index, recordId: outcome.record.pairId, outcome, scores, rationale };
}

/**
 * Process every row. Returns one entry per input row, in input order.
 */
export async function processRecords(
  rows: readonly RawGenePairRow[],
  config: AppConfig,
  options: ProcessOptions = {},
): Promise<ProcessedRow[]> {
  // Fail fast on bad configuration before any row is touched
  const resolved = resolveAppConfig(config);
  const concurrency = options.concurrency ?? resolved.concurrency;
  const limit = pLimit(concurrency);
  const circuitBreaker = new RationaleCircuitBreaker({
    failureThreshold: resolved.ai.circuitBreakerThreshold,
    resetTimeoutMs: Infinity,
  });

  infoLog(`[Triage] Processing ${rows.length} row(s) with profile "${resolved.profile}" (concurrency ${concurrency})`);

  const results = new Array<ProcessedRow | undefined>(rows.length);
  let completed = 0;

  await Promise.all(
    rows.map((row, index) =>
      limit(async () => {
        if (options.signal?.aborted) return;
        results[index] = await processRow(row, index, resolved, options.aiClient, circuitBreaker);
        completed++;
        options.onProgress?.(completed, rows.length);
      }),
    ),
  );

  const processed = results.filter((r): r is ProcessedRow => r !== undefined);
  if (options.signal?.aborted && processed.length < rows.length) {
    throw new RunAbortedError(processed);
  }

  const summary = summarizeRun(processed);
  infoLog(`[Triage] ${formatSummaryOneLiner(summary)}`);
  return processed;
}

// ============================================================================
// SUMMARY
// ============================================================================

function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function summarizeRun(rows: readonly ProcessedRow[]): RunSummary {
  const tierCounts: Record<Tier, number> = { Green: 0, Amber: 0, Red: 0 };
  const quarantineReasonCounts: Record<string, number> = {};
  const finalScores: number[] = [];
  let fallbackNarratives = 0;

  for (const row of rows) {
    if (!row.outcome.valid) {
      for (const reason of row.outcome.reasons) {
        quarantineReasonCounts[reason] = (quarantineReasonCounts[reason] ?? 0) + 1;
      }
      continue;
    }
    if (row.scores) {
      tierCounts[row.scores.tier]++;
      finalScores.push(row.scores.finalScore);
    }
    if (row.rationale?.fallbackMode) fallbackNarratives++;
  }

  const scored = finalScores.length;
  const mean = scored > 0 ? finalScores.reduce((a, b) => a + b, 0) / scored : 0;

  return {
    total: rows.length,
    scored,
    quarantined: rows.length - scored,
    tierCounts,
    quarantineReasonCounts,
    fallbackNarratives,
    meanFinalScore: Math.round(mean * 100) / 100,
    medianFinalScore: Math.round(median(finalScores) * 100) / 100,
  };
}

/**
 * Format a brief one-line summary for logs
 */
export function formatSummaryOneLiner(summary: RunSummary): string {
  const tiers = TIERS.map((t) => `${t}:${summary.tierCounts[t]}`).join(", ");
  return `${summary.total} row(s): ${summary.scored} scored (${tiers}), ${summary.quarantined} quarantined, ${summary.fallbackNarratives} fallback narrative(s)`;
}
