/**
 * Triage Workbook Writer
 *
 * Sheets: Summary, Detailed (scored rows), Quarantine, Metadata.
 *
 * @module report/workbook
 */

import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";

import type { AppConfig } from "../config-schemas";
import type { ProcessedRow, RunSummary } from "../triage/types";

export type RunMetadata = Record<string, string>;

type SheetRow = Record<string, string | number | boolean | null>;

export function summaryRows(summary: RunSummary): SheetRow[] {
  return [
    {
      total_pairs: summary.total,
      scored: summary.scored,
      quarantined: summary.quarantined,
      green_count: summary.tierCounts.Green,
      amber_count: summary.tierCounts.Amber,
      red_count: summary.tierCounts.Red,
      fallback_narratives: summary.fallbackNarratives,
      mean_final_score: summary.meanFinalScore,
      median_final_score: summary.medianFinalScore,
    },
  ];
}

export function detailedRows(rows: readonly ProcessedRow[]): SheetRow[] {
  const out: SheetRow[] = [];
  for (const row of rows) {
    if (!row.outcome.valid || !row.scores || !row.rationale) continue;
    const { record, warnings } = row.outcome;
    out.push({
      pair_id: record.pairId,
      gene_a_name: record.geneA ?? null,
      gene_b_name: record.geneB ?? null,
      statistical_score: row.scores.statisticalScore,
      biological_score: row.scores.biologicalScore,
      progression_score: row.scores.progressionScore,
      progression_pattern: row.scores.progressionPattern,
      final_score: row.scores.finalScore,
      tier: row.scores.tier,
      biological_available: row.rationale.biologicalAssessmentAvailable,
      narrative_source: row.rationale.narrativeSource,
      fallback_reason: row.rationale.fallbackReason,
      warnings: warnings.join("; "),
      rationale: row.rationale.narrative,
    });
  }
  return out;
}

export function quarantineRows(rows: readonly ProcessedRow[]): SheetRow[] {
  const out: SheetRow[] = [];
  for (const row of rows) {
    if (row.outcome.valid) continue;
    out.push({
      row_number: row.index + 1,
      pair_id: row.recordId,
      reasons: row.outcome.reasons.join("; "),
    });
  }
  return out;
}

function toSheet(rows: SheetRow[], headers: string[]): XLSX.WorkSheet {
  return XLSX.utils.json_to_sheet(rows, { header: headers });
}

export function buildTriageWorkbook(
  rows: readonly ProcessedRow[],
  summary: RunSummary,
  config: AppConfig,
  metadata: RunMetadata,
): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, toSheet(summaryRows(summary), []), "Summary");
  XLSX.utils.book_append_sheet(
    workbook,
    toSheet(detailedRows(rows), ["pair_id", "gene_a_name", "gene_b_name", "final_score", "tier"]),
    "Detailed",
  );
  XLSX.utils.book_append_sheet(
    workbook,
    toSheet(quarantineRows(rows), ["row_number", "pair_id", "reasons"]),
    "Quarantine",
  );
  XLSX.utils.book_append_sheet(
    workbook,
    toSheet(
      [{ config: JSON.stringify(config, null, 2), run_metadata: JSON.stringify(metadata, null, 2) }],
      ["config", "run_metadata"],
    ),
    "Metadata",
  );
  return workbook;
}

export function writeTriageWorkbook(
  outputPath: string,
  rows: readonly ProcessedRow[],
  summary: RunSummary,
  config: AppConfig,
  metadata: RunMetadata,
): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  const workbook = buildTriageWorkbook(rows, summary, config, metadata);
  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  fs.writeFileSync(outputPath, buffer);
}
