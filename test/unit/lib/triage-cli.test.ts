/**
 * Tests for the triage command line
 */
import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { CliUsageError, main, parseCliArgs, progressReporter } from "@/lib/triage-cli";
import { __resetDebugLog } from "@/lib/triage/debug";
import { makeTempDir } from "@test/helpers/test-helpers";

describe("parseCliArgs", () => {
  it("should apply defaults for run", () => {
    expect(parseCliArgs(["run", "--input", "pairs.csv"])).toEqual({
      command: "run",
      input: "pairs.csv",
      output: "triage_results.xlsx",
      configPath: undefined,
      profile: undefined,
      disableAi: false,
      flaggedDir: "flagged",
      concurrency: undefined,
      dryRun: false,
    });
  });

  it("should read every run option", () => {
    const args = [
      "run",
      "--input", "pairs.xlsx",
      "--output", "out.xlsx",
      "--config", "triage.json",
      "--profile", "conservative",
      "--disable-ai",
      "--flagged-dir", "review",
      "--concurrency", "8",
      "--dry-run",
    ];
    expect(parseCliArgs(args)).toEqual({
      command: "run",
      input: "pairs.xlsx",
      output: "out.xlsx",
      configPath: "triage.json",
      profile: "conservative",
      disableAi: true,
      flaggedDir: "review",
      concurrency: 8,
      dryRun: true,
    });
  });

  it("should parse dump-profiles with an optional directory", () => {
    expect(parseCliArgs(["dump-profiles"])).toEqual({ command: "dump-profiles", dir: "profiles" });
    expect(parseCliArgs(["dump-profiles", "out"])).toEqual({ command: "dump-profiles", dir: "out" });
  });

  it("should reject bad invocations", () => {
    expect(() => parseCliArgs([])).toThrow(CliUsageError);
    expect(() => parseCliArgs(["score"])).toThrow(CliUsageError);
    expect(() => parseCliArgs(["run"])).toThrow("--input is required");
    expect(() => parseCliArgs(["run", "--input"])).toThrow("--input requires a value");
    expect(() => parseCliArgs(["run", "--input", "a.csv", "--concurrency", "0"])).toThrow(CliUsageError);
    expect(() => parseCliArgs(["run", "--input", "a.csv", "--verbose"])).toThrow("Unknown option '--verbose'");
  });
});

describe("progressReporter", () => {
  beforeEach(() => {
    __resetDebugLog();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should log about every tenth row and the final row", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const report = progressReporter(25);
    for (let completed = 1; completed <= 25; completed++) report(completed);

    const lines = log.mock.calls.map(([line]) => String(line).replace(/^\[[^\]]+\] /, ""));
    expect(lines).toEqual([
      "[INFO] [Triage] Progress 3/25 rows (12%)",
      "[INFO] [Triage] Progress 6/25 rows (24%)",
      "[INFO] [Triage] Progress 9/25 rows (36%)",
      "[INFO] [Triage] Progress 12/25 rows (48%)",
      "[INFO] [Triage] Progress 15/25 rows (60%)",
      "[INFO] [Triage] Progress 18/25 rows (72%)",
      "[INFO] [Triage] Progress 21/25 rows (84%)",
      "[INFO] [Triage] Progress 24/25 rows (96%)",
      "[INFO] [Triage] Progress 25/25 rows (100%)",
    ]);
  });
});

describe("main", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    __resetDebugLog();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should score a csv file and write the workbook and flagged rationales", async () => {
    const input = path.join(dir, "pairs.csv");
    fs.writeFileSync(
      input,
      [
        "pair_id,gene_a_name,gene_b_name,p_ss,dz_ss_mean,confidence_score,n_studies",
        "GP001,IL6,TNF,0.0004,0.5,0.8,5",
        ",IL1B,CXCL8,0.5,0.1,0.2,3",
      ].join("\n"),
      "utf-8",
    );
    const output = path.join(dir, "results.xlsx");
    const flaggedDir = path.join(dir, "flagged");

    const code = await main(["run", "--input", input, "--output", output, "--flagged-dir", flaggedDir, "--disable-ai"]);

    expect(code).toBe(0);
    const workbook = XLSX.read(fs.readFileSync(output), { type: "buffer" });
    expect(workbook.SheetNames).toEqual(["Summary", "Detailed", "Quarantine", "Metadata"]);
    expect(fs.readdirSync(flaggedDir)).toHaveLength(2);
  });

  it("should score without writing files on a dry run", async () => {
    const input = path.join(dir, "pairs.csv");
    fs.writeFileSync(input, "pair_id,gene_a_name,gene_b_name,p_ss,dz_ss_mean,confidence_score,n_studies\nGP001,IL6,TNF,0.0004,0.5,0.8,5\n", "utf-8");
    const output = path.join(dir, "results.xlsx");
    const flaggedDir = path.join(dir, "flagged");

    const code = await main(["run", "--input", input, "--output", output, "--flagged-dir", flaggedDir, "--dry-run"]);

    expect(code).toBe(0);
    expect(fs.existsSync(output)).toBe(false);
    expect(fs.existsSync(flaggedDir)).toBe(false);
    expect(console.log).toHaveBeenCalledWith("Dry run: no workbook or rationale files written");
  });

  it("should return 1 for an unknown profile", async () => {
    const input = path.join(dir, "pairs.csv");
    fs.writeFileSync(input, "pair_id,p_ss\nGP001,0.01\n", "utf-8");
    expect(await main(["run", "--input", input, "--profile", "reckless"])).toBe(1);
  });

  it("should return 1 for a usage error", async () => {
    expect(await main(["run"])).toBe(1);
  });

  it("should dump the built-in profiles", async () => {
    const target = path.join(dir, "profiles");
    expect(await main(["dump-profiles", target])).toBe(0);
    expect(fs.readdirSync(target).sort()).toEqual([
      "aggressive.json",
      "balanced.json",
      "conservative.json",
      "two_factor.json",
    ]);
  });
});
