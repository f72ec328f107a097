/**
 * Command-line entry for triage runs
 *
 * Commands:
 *   run            score an input file and write the workbook + flagged rationales
 *                  (--dry-run scores and prints the summary without writing files)
 *   dump-profiles  write the built-in profiles as JSON for reference
 *
 * @module triage-cli
 */

import * as path from "path";

import { ConfigurationError } from "./config-schemas";
import { dumpDefaultProfiles, loadAppConfig } from "./config-loader";
import { checkColumns, readRecordsFile } from "./record-import";
import { formatRunSummaryMarkdown, writeFlaggedRationales } from "./report/markdown";
import { writeTriageWorkbook } from "./report/workbook";
import { configureDebugLog, errorLog, infoLog, warnLog } from "./triage/debug";
import { createRationaleClient } from "./triage/llm";
import { processRecords, summarizeRun } from "./triage/pipeline";

export const USAGE = [
  "Usage:",
  "  npx tsx scripts/run-triage.ts run --input <file.csv|file.xlsx> [--output <file.xlsx>]",
  "      [--config <file.json>] [--profile <name>] [--disable-ai] [--flagged-dir <dir>] [--concurrency <n>]",
  "      [--dry-run]",
  "  npx tsx scripts/run-triage.ts dump-profiles [dir]",
].join("\n");

export type CliCommand =
  | {
      command: "run";
      input: string;
      output: string;
      configPath?: string;
      profile?: string;
      disableAi: boolean;
      flaggedDir: string;
      concurrency?: number;
      dryRun: boolean;
    }
  | { command: "dump-profiles"; dir: string };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function takeValue(argv: string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;

  if (command === "dump-profiles") {
    return { command, dir: rest[0] ?? "profiles" };
  }
  if (command !== "run") {
    throw new CliUsageError(command ? `Unknown command '${command}'` : "No command given");
  }

  let input: string | undefined;
  let output = "triage_results.xlsx";
  let configPath: string | undefined;
  let profile: string | undefined;
  let disableAi = false;
  let flaggedDir = "flagged";
  let concurrency: number | undefined;
  let dryRun = false;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--input":
        input = takeValue(rest, i++, token);
        break;
      case "--output":
        output = takeValue(rest, i++, token);
        break;
      case "--config":
        configPath = takeValue(rest, i++, token);
        break;
      case "--profile":
        profile = takeValue(rest, i++, token);
        break;
      case "--flagged-dir":
        flaggedDir = takeValue(rest, i++, token);
        break;
      case "--concurrency": {
        const raw = takeValue(rest, i++, token);
        const parsed = Number(raw);
        if (!Number.isInteger(parsed) || parsed < 1) {
          throw new CliUsageError(`--concurrency must be a positive integer (got '${raw}')`);
        }
        concurrency = parsed;
        break;
      }
      case "--disable-ai":
        disableAi = true;
        break;
      case "--dry-run":
        dryRun = true;
        break;
      default:
        throw new CliUsageError(`Unknown option '${token}'`);
    }
  }

  if (!input) {
    throw new CliUsageError("--input is required");
  }
  return { command: "run", input, output, configPath, profile, disableAi, flaggedDir, concurrency, dryRun };
}

/** Logs roughly every tenth of the run, and always the last row. */
export function progressReporter(total: number): (completed: number) => void {
  const step = Math.max(1, Math.ceil(total / 10));
  return (completed) => {
    if (completed === total || completed % step === 0) {
      infoLog(`[Triage] Progress ${completed}/${total} rows (${Math.round((completed / total) * 100)}%)`);
    }
  };
}

function runTimestamp(now: Date): string {
  return now.toISOString().replace(/[-:]/g, "").replace(/\..*$/, "");
}

async function runTriage(cmd: Extract<CliCommand, { command: "run" }>): Promise<number> {
  const loaded = loadAppConfig({ configPath: cmd.configPath, profile: cmd.profile });
  const config = loaded.config;
  configureDebugLog(config.logging);

  for (const o of loaded.overrides) {
    infoLog(`[Triage] Env override ${o.envVar} → ${o.fieldPath} = ${String(o.appliedValue)}`);
  }

  const parsed = readRecordsFile(cmd.input);
  const { missing, missingOptional } = checkColumns(parsed.headers);
  if (missing.length > 0) {
    warnLog(`[Triage] Input is missing expected column(s): ${missing.join(", ")}`);
  }
  if (missingOptional.length > 0) {
    infoLog(`[Triage] Optional biological column(s) absent: ${missingOptional.join(", ")}`);
  }

  // Dry runs never call the rationale service
  const aiClient = cmd.disableAi || cmd.dryRun ? undefined : createRationaleClient(config.ai);
  const rows = await processRecords(parsed.rows, config, {
    aiClient,
    concurrency: cmd.concurrency,
    onProgress: progressReporter(parsed.rows.length),
  });
  const summary = summarizeRun(rows);

  if (cmd.dryRun) {
    console.log(formatRunSummaryMarkdown(summary));
    console.log("Dry run: no workbook or rationale files written");
    return 0;
  }

  const now = new Date();
  writeTriageWorkbook(cmd.output, rows, summary, config, {
    input: path.resolve(cmd.input),
    configSource: loaded.source,
    profile: config.profile,
    aiEnabled: String(aiClient !== undefined),
    generatedAt: now.toISOString(),
  });
  const flagged = writeFlaggedRationales(rows, cmd.flaggedDir, runTimestamp(now));

  console.log(formatRunSummaryMarkdown(summary));
  console.log(`Workbook: ${cmd.output}`);
  console.log(`Flagged rationales: ${flagged.length} file(s) in ${cmd.flaggedDir}`);
  return 0;
}

/**
 * Run one CLI invocation and return the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  let cmd: CliCommand;
  try {
    cmd = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`${err.message}\n${USAGE}`);
      return 1;
    }
    throw err;
  }

  try {
    if (cmd.command === "dump-profiles") {
      const files = dumpDefaultProfiles(cmd.dir);
      files.forEach((f) => console.log(`Wrote ${f}`));
      return 0;
    }
    return await runTriage(cmd);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      errorLog(`[Triage] ${err.message}`);
      return 1;
    }
    const message = err instanceof Error ? err.message : String(err);
    errorLog(`[Triage] Run failed: ${message}`);
    return 1;
  }
}
