/**
 * Markdown report formatting
 *
 * One file per flagged pair (Amber, Red or quarantined) plus a run summary.
 */

import * as fs from "fs";
import * as path from "path";

import type { ProcessedRow, RationaleReport, RunSummary } from "../triage/types";
import { TIERS } from "../triage/types";

function passMark(passed: boolean | null): string {
  if (passed === null) return "n/a";
  return passed ? "pass" : "fail";
}

/**
 * Format a rationale report as Markdown
 */
export function renderRationaleMarkdown(report: RationaleReport): string {
  const lines: string[] = [];

  lines.push(`# Gene Pair ${report.pairId}`);
  lines.push("");
  lines.push(`**Tier:** ${report.tier}  `);
  lines.push(`**Final score:** ${report.finalScore.toFixed(1)}`);
  lines.push("");

  lines.push("## Factors");
  lines.push("");
  lines.push("| Factor | Result | Detail |");
  lines.push("|--------|--------|--------|");
  for (const factor of report.factors) {
    lines.push(`| ${factor.label} | ${passMark(factor.passed)} | ${factor.statement.replace(/\|/g, "\\|")} |`);
  }
  lines.push("");

  if (report.notes.length > 0) {
    lines.push("## Notes");
    lines.push("");
    report.notes.forEach((note) => lines.push(`- ${note}`));
    lines.push("");
  }

  lines.push("## Narrative");
  lines.push("");
  lines.push(report.narrative);
  lines.push("");

  if (report.fallbackMode) {
    lines.push("---");
    lines.push("");
    lines.push(`*Deterministic narrative (fallback mode: ${report.fallbackReason ?? "unknown"}).*`);
    lines.push("");
  }

  return lines.join("\n");
}

export function renderQuarantineMarkdown(row: ProcessedRow): string {
  if (row.outcome.valid) return "";
  const lines = [
    `# Quarantined row ${row.index + 1}${row.recordId ? ` (${row.recordId})` : ""}`,
    "",
    "Validation failed; the row was not scored.",
    "",
    ...row.outcome.reasons.map((r) => `- \`${r}\``),
    "",
  ];
  return lines.join("\n");
}

export function safeFileName(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]+/g, "_").slice(0, 80) || "unnamed";
}

/**
 * Write one Markdown file per Amber/Red or quarantined row.
 * Returns the written paths.
 */
export function writeFlaggedRationales(rows: readonly ProcessedRow[], destination: string, timestamp: string): string[] {
  fs.mkdirSync(destination, { recursive: true });
  const written: string[] = [];

  for (const row of rows) {
    let content: string;
    let name: string;
    if (!row.outcome.valid) {
      content = renderQuarantineMarkdown(row);
      name = `${timestamp}_row${row.index + 1}_quarantined.md`;
    } else if (row.rationale && row.rationale.tier !== "Green") {
      content = renderRationaleMarkdown(row.rationale);
      name = `${timestamp}_row${row.index + 1}_${safeFileName(row.rationale.pairId)}.md`;
    } else {
      continue;
    }
    const file = path.join(destination, name);
    fs.writeFileSync(file, content, "utf-8");
    written.push(file);
  }

  return written;
}

/**
 * Format the run summary as Markdown
 */
export function formatRunSummaryMarkdown(summary: RunSummary): string {
  const lines: string[] = [];
  lines.push("## Run Summary");
  lines.push("");
  lines.push(`- Total rows: ${summary.total}`);
  lines.push(`- Scored: ${summary.scored}`);
  lines.push(`- Quarantined: ${summary.quarantined}`);
  lines.push(`- Fallback narratives: ${summary.fallbackNarratives}`);
  lines.push(`- Mean final score: ${summary.meanFinalScore.toFixed(2)}`);
  lines.push(`- Median final score: ${summary.medianFinalScore.toFixed(2)}`);
  lines.push("");
  lines.push("| Tier | Count |");
  lines.push("|------|-------|");
  TIERS.forEach((tier) => lines.push(`| ${tier} | ${summary.tierCounts[tier]} |`));
  lines.push("");

  const reasons = Object.entries(summary.quarantineReasonCounts).sort(([a], [b]) => a.localeCompare(b));
  if (reasons.length > 0) {
    lines.push("| Quarantine reason | Count |");
    lines.push("|-------------------|-------|");
    reasons.forEach(([reason, count]) => lines.push(`| ${reason} | ${count} |`));
    lines.push("");
  }

  return lines.join("\n");
}
