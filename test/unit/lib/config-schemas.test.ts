/**
 * Tests for configuration schemas and built-in profiles
 */
import { describe, it, expect } from "vitest";

import {
  ConfigurationError,
  DEFAULT_APP_CONFIG,
  DEFAULT_SCORING_CONFIG,
  PROFILE_NAMES,
  SCORING_PROFILES,
  resolveAppConfig,
  resolveScoringConfig,
} from "@/lib/config-schemas";

function captureConfigError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

describe("resolveScoringConfig", () => {
  it("should accept every built-in profile", () => {
    for (const name of PROFILE_NAMES) {
      expect(() => resolveScoringConfig(SCORING_PROFILES[name])).not.toThrow();
    }
  });

  it("should return a deep-frozen copy", () => {
    const resolved = resolveScoringConfig(DEFAULT_SCORING_CONFIG);
    expect(resolved).toEqual(DEFAULT_SCORING_CONFIG);
    expect(Object.isFrozen(resolved)).toBe(true);
    expect(Object.isFrozen(resolved.tiers)).toBe(true);
    expect(Object.isFrozen(resolved.biological.positivePhenotypes)).toBe(true);
    expect(resolved).not.toBe(DEFAULT_SCORING_CONFIG);
  });

  it("should freeze the defaults and every built-in profile", () => {
    expect(Object.isFrozen(DEFAULT_APP_CONFIG.ai)).toBe(true);
    for (const name of PROFILE_NAMES) {
      const profile = SCORING_PROFILES[name];
      expect(Object.isFrozen(profile)).toBe(true);
      expect(Object.isFrozen(profile.statisticalWeights)).toBe(true);
      expect(Object.isFrozen(profile.transforms)).toBe(true);
      expect(Object.isFrozen(profile.biological.positivePhenotypes)).toBe(true);
    }
    expect(Reflect.set(SCORING_PROFILES.conservative.statisticalWeights, "pValue", 0.9)).toBe(false);
    expect(SCORING_PROFILES.balanced.statisticalWeights.pValue).toBe(0.3);
  });

  it("should reject statistical weights that do not sum to 1", () => {
    const error = captureConfigError(() =>
      resolveScoringConfig({
        ...DEFAULT_SCORING_CONFIG,
        statisticalWeights: { ...DEFAULT_SCORING_CONFIG.statisticalWeights, pValue: 0.5 },
      }),
    );
    expect(error.issues).toEqual(["statisticalWeights: statisticalWeights must sum to 1.0 (got 1.200000)"]);
  });

  it("should accept weight sums within the tolerance", () => {
    const weights = { statistical: 0.45 + 5e-7, biological: 0.3, progression: 0.25 };
    expect(() => resolveScoringConfig({ ...DEFAULT_SCORING_CONFIG, fusionWeights: weights })).not.toThrow();
  });

  it("should reject an amber cutoff above the green cutoff", () => {
    const error = captureConfigError(() =>
      resolveScoringConfig({ ...DEFAULT_SCORING_CONFIG, tiers: { greenMin: 60, amberMin: 70 } }),
    );
    expect(error.issues).toEqual(["tiers.amberMin: amberMin must be less than or equal to greenMin"]);
  });

  it("should reject negative weights", () => {
    const error = captureConfigError(() =>
      resolveScoringConfig({
        ...DEFAULT_SCORING_CONFIG,
        fusionWeights: { statistical: -0.1, biological: 0.6, progression: 0.5 },
      }),
    );
    expect(error.issues[0]).toMatch(/^fusionWeights\.statistical: /);
  });
});

describe("resolveAppConfig", () => {
  it("should accept the defaults", () => {
    expect(resolveAppConfig(DEFAULT_APP_CONFIG).profile).toBe("balanced");
  });

  it("should reject an out-of-range concurrency", () => {
    expect(() => resolveAppConfig({ ...DEFAULT_APP_CONFIG, concurrency: 0 })).toThrow(ConfigurationError);
  });

  it("should reject an unknown AI provider", () => {
    const error = captureConfigError(() =>
      resolveAppConfig({ ...DEFAULT_APP_CONFIG, ai: { ...DEFAULT_APP_CONFIG.ai, provider: "other" } }),
    );
    expect(error.message).toMatch(/^Invalid configuration: ai\.provider: /);
  });
});
