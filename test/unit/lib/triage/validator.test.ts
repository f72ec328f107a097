/**
 * Tests for the Row Validator
 *
 * Required fields, numeric coercion, range gates, reason ordering and the
 * non-blocking data-quality warnings.
 */
import { describe, it, expect } from "vitest";

import { DEFAULT_SCORING_CONFIG, SCORING_PROFILES } from "@/lib/config-schemas";
import {
  isSuspiciousGeneSymbol,
  parseBooleanFlag,
  parseNumeric,
  rowIdentifier,
  validateRecord,
} from "@/lib/triage/validator";
import { makeRow } from "@test/helpers/test-helpers";

const config = DEFAULT_SCORING_CONFIG;

describe("validateRecord", () => {
  it("should accept a complete row and build a typed record", () => {
    const outcome = validateRecord(makeRow(), config);
    expect(outcome.valid).toBe(true);
    if (!outcome.valid) return;
    expect(outcome.record.pairId).toBe("GP001");
    expect(outcome.record.pValue).toBe(0.0004);
    expect(outcome.record.iSquared).toBe(30);
    expect(outcome.record.nStudies).toBe(5);
    expect(outcome.record.isStatisticallySound).toBe(true);
    expect(outcome.record.interactionFlag).toBeUndefined();
    expect(outcome.warnings).toEqual([]);
  });

  it("should freeze the record", () => {
    const outcome = validateRecord(makeRow(), config);
    if (!outcome.valid) throw new Error("expected valid");
    expect(Object.isFrozen(outcome.record)).toBe(true);
  });

  it("should list missing fields before range violations", () => {
    const outcome = validateRecord(makeRow({ pair_id: undefined, p_ss: 1.5 }), config);
    expect(outcome).toEqual({
      valid: false,
      reasons: ["missing_field:pair_id", "range_violation:p_ss"],
    });
  });

  it("should list type errors after missing fields", () => {
    const outcome = validateRecord(makeRow({ p_ss: "abc", dz_ss_mean: "  " }), config);
    expect(outcome).toEqual({
      valid: false,
      reasons: ["missing_field:dz_ss_mean", "type_error:p_ss"],
    });
  });

  it("should treat a blank pair_id as missing", () => {
    const outcome = validateRecord(makeRow({ pair_id: "   " }), config);
    expect(outcome).toEqual({ valid: false, reasons: ["missing_field:pair_id"] });
  });

  it("should accept p_ss at both bounds", () => {
    expect(validateRecord(makeRow({ p_ss: 0 }), config).valid).toBe(true);
    expect(validateRecord(makeRow({ p_ss: 1 }), config).valid).toBe(true);
    expect(validateRecord(makeRow({ p_ss: -0.01 }), config)).toEqual({
      valid: false,
      reasons: ["range_violation:p_ss"],
    });
  });

  it("should reject i_squared outside [0, 100]", () => {
    expect(validateRecord(makeRow({ i_squared: 120 }), config)).toEqual({
      valid: false,
      reasons: ["range_violation:i_squared"],
    });
    expect(validateRecord(makeRow({ i_squared: 100 }), config).valid).toBe(true);
  });

  it("should gate n_studies on the profile minimum", () => {
    expect(validateRecord(makeRow({ n_studies: 2 }), config).valid).toBe(true);
    expect(validateRecord(makeRow({ n_studies: 1 }), config)).toEqual({
      valid: false,
      reasons: ["range_violation:n_studies"],
    });
    expect(validateRecord(makeRow({ n_studies: 2 }), SCORING_PROFILES.conservative)).toEqual({
      valid: false,
      reasons: ["range_violation:n_studies"],
    });
  });

  it("should coerce numeric strings", () => {
    const outcome = validateRecord(makeRow({ p_ss: " 0.01 ", n_studies: "4" }), config);
    if (!outcome.valid) throw new Error("expected valid");
    expect(outcome.record.pValue).toBe(0.01);
    expect(outcome.record.nStudies).toBe(4);
  });

  it("should leave absent optional metrics undefined", () => {
    const outcome = validateRecord(makeRow({ kappa: undefined, egger_p: "" }), config);
    if (!outcome.valid) throw new Error("expected valid");
    expect(outcome.record.kappa).toBeUndefined();
    expect(outcome.record.eggerP).toBeUndefined();
  });

  it("should read legacy column names when the canonical column is absent", () => {
    const outcome = validateRecord(
      makeRow({ i_squared: undefined, dz_ss_i2: 40, kappa: undefined, kappa_ss: 0.6 }),
      config,
    );
    if (!outcome.valid) throw new Error("expected valid");
    expect(outcome.record.iSquared).toBe(40);
    expect(outcome.record.kappa).toBe(0.6);
  });

  it("should stringify a numeric pair_id", () => {
    const outcome = validateRecord(makeRow({ pair_id: 42 }), config);
    if (!outcome.valid) throw new Error("expected valid");
    expect(outcome.record.pairId).toBe("42");
  });

  it("should warn on suspicious gene symbols without rejecting the row", () => {
    const outcome = validateRecord(makeRow({ gene_a_name: "il6", gene_b_name: undefined }), config);
    if (!outcome.valid) throw new Error("expected valid");
    expect(outcome.warnings).toEqual(["gene_symbol:gene_a_name", "gene_symbol:gene_b_name"]);
    expect(outcome.record.geneA).toBe("il6");
    expect(outcome.record.geneB).toBeUndefined();
  });

  it("should parse biological flags and normalise the phenotype", () => {
    const outcome = validateRecord(makeRow({ interaction_flag: "Yes", phenotype_flag: " Lethal " }), config);
    if (!outcome.valid) throw new Error("expected valid");
    expect(outcome.record.interactionFlag).toBe(true);
    expect(outcome.record.phenotypeFlag).toBe("lethal");
  });

  it("should ignore an unrecognised flag value with a warning", () => {
    const outcome = validateRecord(makeRow({ interaction_flag: "maybe" }), config);
    if (!outcome.valid) throw new Error("expected valid");
    expect(outcome.record.interactionFlag).toBeUndefined();
    expect(outcome.warnings).toEqual(["unrecognised_flag:interaction_flag"]);
  });
});

describe("value helpers", () => {
  it("should parse numbers and numeric strings only", () => {
    expect(parseNumeric(3)).toBe(3);
    expect(parseNumeric("2.5")).toBe(2.5);
    expect(parseNumeric("n/a")).toBeNull();
    expect(parseNumeric(Number.NaN)).toBeNull();
    expect(parseNumeric(true)).toBeNull();
  });

  it("should parse boolean flags", () => {
    expect(parseBooleanFlag("TRUE")).toBe(true);
    expect(parseBooleanFlag("n")).toBe(false);
    expect(parseBooleanFlag(1)).toBe(true);
    expect(parseBooleanFlag(0)).toBe(false);
    expect(parseBooleanFlag(2)).toBeNull();
    expect(parseBooleanFlag("unknown")).toBeNull();
  });

  it("should flag gene symbols that are not upper-case alphanumeric", () => {
    expect(isSuspiciousGeneSymbol("HLA-DRA")).toBe(false);
    expect(isSuspiciousGeneSymbol("IL6")).toBe(false);
    expect(isSuspiciousGeneSymbol("Il6")).toBe(true);
    expect(isSuspiciousGeneSymbol("123")).toBe(true);
    expect(isSuspiciousGeneSymbol("")).toBe(true);
  });

  it("should identify rows even when they fail validation", () => {
    expect(rowIdentifier(makeRow({ pair_id: " GP9 " }))).toBe("GP9");
    expect(rowIdentifier(makeRow({ pair_id: undefined }))).toBeNull();
  });
});
