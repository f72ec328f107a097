/**
 * Parse gene-pair rows from CSV or XLSX: first worksheet, first row = headers.
 * Rows are returned untyped; the Row Validator owns coercion and checks.
 */

import * as fs from "fs";
import * as XLSX from "xlsx";

import { COLUMN_ALIASES, GENE_COLUMNS, NUMERIC_FIELDS } from "./triage/validator";
import type { RawGenePairRow } from "./triage/types";

export type ParsedRecords = {
  headers: string[];
  rows: RawGenePairRow[];
};

/** Columns the scorer reads; anything else is carried but ignored. */
export const EXPECTED_COLUMNS: readonly string[] = [
  "pair_id",
  ...GENE_COLUMNS,
  ...NUMERIC_FIELDS,
  "is_statistically_sound",
  "interaction_flag",
  "phenotype_flag",
];

/** Biological signal columns are optional inputs from an upstream collaborator. */
const OPTIONAL_COLUMNS = new Set([
  "pathway_p_value",
  "expression_z_score",
  "interaction_flag",
  "phenotype_flag",
]);

function isCellEmpty(value: unknown): boolean {
  return value === undefined || value === null || String(value).trim() === "";
}

function sheetToRows(workbook: XLSX.WorkBook): ParsedRecords {
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) {
    throw new Error("Workbook has no worksheets");
  }
  const sheet = workbook.Sheets[firstSheetName];
  if (!sheet) {
    throw new Error("First worksheet could not be read");
  }

  // header: 1 => array of arrays; first row = headers
  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true });
  if (!raw.length) {
    return { headers: [], rows: [] };
  }

  const headers = (raw[0] ?? []).map((h, j) => String(h ?? "").trim() || `Column${j}`);
  const rows: RawGenePairRow[] = [];
  for (let i = 1; i < raw.length; i++) {
    const cells = raw[i] ?? [];
    if (cells.every(isCellEmpty)) continue;
    const row: Record<string, unknown> = {};
    headers.forEach((key, j) => {
      const cell = cells[j];
      row[key] = isCellEmpty(cell) ? null : cell;
    });
    rows.push(row);
  }
  return { headers, rows };
}

/**
 * Parse CSV text. Every cell stays a string: no number or date inference,
 * so identifiers such as "007" or "1/2" survive unchanged.
 */
export function parseRecordsCsv(text: string): ParsedRecords {
  return sheetToRows(XLSX.read(text, { type: "string", raw: true }));
}

/**
 * Read a `.csv` or `.xlsx` file.
 */
export function readRecordsFile(filePath: string): ParsedRecords {
  if (filePath.toLowerCase().endsWith(".csv")) {
    return parseRecordsCsv(fs.readFileSync(filePath, "utf-8"));
  }
  return sheetToRows(XLSX.read(fs.readFileSync(filePath), { type: "buffer" }));
}

/**
 * Report expected columns that are missing. A legacy alias counts as present.
 */
export function checkColumns(headers: readonly string[]): { missing: string[]; missingOptional: string[] } {
  const present = new Set(headers);
  const missing: string[] = [];
  const missingOptional: string[] = [];
  for (const column of EXPECTED_COLUMNS) {
    const alias = COLUMN_ALIASES[column];
    if (present.has(column) || (alias !== undefined && present.has(alias))) continue;
    if (OPTIONAL_COLUMNS.has(column)) missingOptional.push(column);
    else missing.push(column);
  }
  return { missing, missingOptional };
}
