/**
 * Tests for CSV/XLSX record import and column checks
 */
import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { describe, it, expect, afterEach } from "vitest";

import { EXPECTED_COLUMNS, checkColumns, parseRecordsCsv, readRecordsFile } from "@/lib/record-import";
import { makeTempDir } from "@test/helpers/test-helpers";

describe("parseRecordsCsv", () => {
  it("should key rows by header and keep every cell as text", () => {
    const parsed = parseRecordsCsv("pair_id,gene_a_name,p_ss\nGP001,IL6,0.001\nGP002,TNF,0.2\n");
    expect(parsed.headers).toEqual(["pair_id", "gene_a_name", "p_ss"]);
    expect(parsed.rows).toHaveLength(2);
    expect(parsed.rows[0]).toEqual({ pair_id: "GP001", gene_a_name: "IL6", p_ss: "0.001" });
  });

  it("should not reinterpret identifiers as dates or numbers", () => {
    const parsed = parseRecordsCsv(
      "pair_id,gene_a_name,gene_b_name,p_ss\n1/2,SEPT9,MARCH1,0.01\n007,IL6,TNF,TRUE\n",
    );
    expect(parsed.rows).toEqual([
      { pair_id: "1/2", gene_a_name: "SEPT9", gene_b_name: "MARCH1", p_ss: "0.01" },
      { pair_id: "007", gene_a_name: "IL6", gene_b_name: "TNF", p_ss: "TRUE" },
    ]);
  });

  it("should fill blank cells with null and skip empty lines", () => {
    const parsed = parseRecordsCsv("pair_id,kappa,p_ss\nGP001,,0.01\n,,\nGP002,0.5,0.02\n");
    expect(parsed.rows.map((r) => r.pair_id)).toEqual(["GP001", "GP002"]);
    expect(parsed.rows[0].kappa).toBeNull();
  });
});

describe("readRecordsFile", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("should read the first worksheet of an xlsx file", () => {
    dir = makeTempDir();
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ["pair_id", "p_ss", "dz_ss_mean"],
        ["GP010", 0.003, -0.4],
      ]),
      "Pairs",
    );
    const file = path.join(dir, "pairs.xlsx");
    fs.writeFileSync(file, XLSX.write(workbook, { type: "buffer", bookType: "xlsx" }));

    const parsed = readRecordsFile(file);
    expect(parsed.headers).toEqual(["pair_id", "p_ss", "dz_ss_mean"]);
    expect(parsed.rows).toEqual([{ pair_id: "GP010", p_ss: 0.003, dz_ss_mean: -0.4 }]);
  });

  it("should read csv files by extension", () => {
    dir = makeTempDir();
    const file = path.join(dir, "pairs.csv");
    fs.writeFileSync(file, "pair_id,p_ss\nGP011,0.04\n", "utf-8");
    expect(readRecordsFile(file).rows).toEqual([{ pair_id: "GP011", p_ss: "0.04" }]);
  });
});

describe("checkColumns", () => {
  it("should report nothing missing for the full column set", () => {
    expect(checkColumns(EXPECTED_COLUMNS)).toEqual({ missing: [], missingOptional: [] });
  });

  it("should accept legacy aliases and separate optional columns", () => {
    const headers = EXPECTED_COLUMNS.filter((c) => c !== "i_squared" && c !== "pathway_p_value").concat("dz_ss_i2");
    expect(checkColumns(headers)).toEqual({ missing: [], missingOptional: ["pathway_p_value"] });
  });

  it("should list required columns that are absent", () => {
    const headers = EXPECTED_COLUMNS.filter((c) => c !== "p_ss" && c !== "kappa");
    expect(checkColumns(headers).missing).toEqual(["p_ss", "kappa"]);
  });
});
