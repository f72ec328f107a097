/**
 * Configuration Schemas
 *
 * Zod schemas for validating scoring, AI and logging configuration,
 * plus the built-in scoring profiles.
 *
 * @module config-schemas
 */

import { z } from "zod";

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Fatal configuration problem. Raised before any row is processed.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Tolerance for "weights sum to 1.0" checks. */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

// ============================================================================
// SCORING CONFIG SCHEMA
// ============================================================================

const Weight = z.number().min(0).max(1);

export const StatisticalWeightsSchema = z.object({
  pValue: Weight,
  effectSize: Weight,
  heterogeneity: Weight,
  consistency: Weight,
  bias: Weight,
  power: Weight,
});

export const FusionWeightsSchema = z.object({
  statistical: Weight,
  biological: Weight,
  progression: Weight,
});

export const TierCutoffsSchema = z.object({
  greenMin: z.number().min(0).max(100),
  amberMin: z.number().min(0).max(100),
});

export const TransformSettingsSchema = z.object({
  pValueLogScale: z.number().positive().describe("-log10(p) that maps to a p-score of 100"),
  effectSizeSaturation: z.number().positive().describe("|Cohen's d| at which the effect score saturates"),
  heterogeneityCeiling: z.number().positive().max(100).describe("I² at which the heterogeneity score reaches 0"),
  eggerAlpha: z.number().gt(0).lt(1).describe("Egger p-value below which publication bias is assumed"),
  progressionDeltaThreshold: z.number().gt(0).max(2).describe("Correlation delta marking amplification/attenuation"),
});

export const BiologicalSettingsSchema = z.object({
  neutralScore: z.number().min(0).max(100),
  intercept: z.number(),
  interactionLogOdds: z.number().min(0),
  phenotypeLogOdds: z.number().min(0),
  pathwayLogOdds: z.number().min(0),
  expressionLogOdds: z.number().min(0),
  pathwaySignificance: z.number().gt(0).lt(1),
  expressionZThreshold: z.number().min(0),
  positivePhenotypes: z.array(z.string().min(1)).min(1),
});

export const NominalThresholdsSchema = z.object({
  minStudies: z.number().int().min(1),
  maxPValue: z.number().gt(0).max(1),
  maxHeterogeneity: z.number().min(0).max(100),
  minEffectSize: z.number().min(0),
  minKappa: z.number().min(0).max(1),
  minPowerScore: z.number().min(0).max(1),
});

function checkWeightSum(
  weights: Record<string, number>,
  path: string,
  ctx: z.RefinementCtx,
): void {
  const sum = Object.values(weights).reduce((acc, w) => acc + w, 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [path],
      message: `${path} must sum to 1.0 (got ${sum.toFixed(6)})`,
    });
  }
}

export const ScoringConfigSchema = z
  .object({
    statisticalWeights: StatisticalWeightsSchema,
    fusionWeights: FusionWeightsSchema,
    tiers: TierCutoffsSchema,
    transforms: TransformSettingsSchema,
    biological: BiologicalSettingsSchema,
    thresholds: NominalThresholdsSchema,
  })
  .superRefine((cfg, ctx) => {
    checkWeightSum(cfg.statisticalWeights, "statisticalWeights", ctx);
    checkWeightSum(cfg.fusionWeights, "fusionWeights", ctx);
    if (cfg.tiers.amberMin > cfg.tiers.greenMin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["tiers", "amberMin"],
        message: "amberMin must be less than or equal to greenMin",
      });
    }
  });

export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;

// ============================================================================
// AI / LOGGING / APP CONFIG SCHEMAS
// ============================================================================

export const AiSettingsSchema = z.object({
  enabled: z.boolean().describe("Request AI narratives (false = deterministic fallback only)"),
  provider: z.enum(["openai", "anthropic"]),
  baseUrl: z.string().url().nullable().describe("OpenAI-compatible endpoint; null = provider default"),
  model: z.string().min(1),
  temperature: z.number().min(0).max(1.5),
  maxTokens: z.number().int().min(1).max(8192),
  timeoutMs: z.number().int().min(100).max(600_000),
  retryAttempts: z.number().int().min(0).max(5),
  retryDelayMs: z.number().int().min(0).max(60_000),
  circuitBreakerThreshold: z.number().int().min(1).max(100)
    .describe("Consecutive narrative failures before AI calls are skipped for the rest of the run"),
});

export const LoggingSettingsSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  file: z.string().min(1).nullable(),
});

export const AppConfigSchema = z.object({
  profile: z.string().min(1),
  scoring: ScoringConfigSchema,
  ai: AiSettingsSchema,
  logging: LoggingSettingsSchema,
  concurrency: z.number().int().min(1).max(64),
});

export type AiSettings = z.infer<typeof AiSettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

// ============================================================================
// DEFAULTS & PROFILES
// ============================================================================

export const DEFAULT_SCORING_CONFIG: ScoringConfig = deepFreeze({
  statisticalWeights: {
    pValue: 0.3,
    effectSize: 0.2,
    heterogeneity: 0.2,
    consistency: 0.15,
    bias: 0.1,
    power: 0.05,
  },
  fusionWeights: { statistical: 0.45, biological: 0.3, progression: 0.25 },
  tiers: { greenMin: 75, amberMin: 50 },
  transforms: {
    pValueLogScale: 6,
    effectSizeSaturation: 0.4,
    heterogeneityCeiling: 100,
    eggerAlpha: 0.05,
    progressionDeltaThreshold: 0.15,
  },
  biological: {
    neutralScore: 50,
    intercept: 0,
    interactionLogOdds: 1.0,
    phenotypeLogOdds: 0.8,
    pathwayLogOdds: 1.2,
    expressionLogOdds: 0.9,
    pathwaySignificance: 0.05,
    expressionZThreshold: 2.0,
    positivePhenotypes: ["lethal", "immune"],
  },
  thresholds: {
    minStudies: 2,
    maxPValue: 0.01,
    maxHeterogeneity: 60,
    minEffectSize: 0.25,
    minKappa: 0.5,
    minPowerScore: 0.7,
  },
});

export const DEFAULT_AI_SETTINGS: AiSettings = deepFreeze({
  enabled: false,
  provider: "openai",
  baseUrl: null,
  model: "gpt-4o-mini",
  temperature: 0.6,
  maxTokens: 512,
  timeoutMs: 60_000,
  retryAttempts: 2,
  retryDelayMs: 1_000,
  circuitBreakerThreshold: 3,
});

export const DEFAULT_LOGGING_SETTINGS: LoggingSettings = deepFreeze({
  level: "info",
  file: null,
});

export const DEFAULT_APP_CONFIG: AppConfig = deepFreeze({
  profile: "balanced",
  scoring: DEFAULT_SCORING_CONFIG,
  ai: DEFAULT_AI_SETTINGS,
  logging: DEFAULT_LOGGING_SETTINGS,
  concurrency: 4,
});

export type ProfileName = "balanced" | "conservative" | "aggressive" | "two_factor";

export const PROFILE_NAMES: readonly ProfileName[] = ["balanced", "conservative", "aggressive", "two_factor"];

export function isProfileName(name: string): name is ProfileName {
  return PROFILE_NAMES.some((profile) => profile === name);
}

/**
 * Scoring profiles. Each one is a complete ScoringConfig; none is derived
 * from another at runtime. Profiles share frozen nested defaults.
 */
export const SCORING_PROFILES: Record<ProfileName, ScoringConfig> = deepFreeze({
  balanced: DEFAULT_SCORING_CONFIG,
  conservative: {
    ...DEFAULT_SCORING_CONFIG,
    fusionWeights: { statistical: 0.5, biological: 0.3, progression: 0.2 },
    tiers: { greenMin: 80, amberMin: 60 },
    thresholds: {
      minStudies: 3,
      maxPValue: 0.001,
      maxHeterogeneity: 40,
      minEffectSize: 0.35,
      minKappa: 0.6,
      minPowerScore: 0.8,
    },
  },
  aggressive: {
    ...DEFAULT_SCORING_CONFIG,
    fusionWeights: { statistical: 0.4, biological: 0.35, progression: 0.25 },
    tiers: { greenMin: 70, amberMin: 45 },
    thresholds: {
      minStudies: 2,
      maxPValue: 0.05,
      maxHeterogeneity: 75,
      minEffectSize: 0.15,
      minKappa: 0.4,
      minPowerScore: 0.6,
    },
  },
  // 50/50 statistical-biological scheme; progression does not contribute.
  two_factor: {
    ...DEFAULT_SCORING_CONFIG,
    fusionWeights: { statistical: 0.5, biological: 0.5, progression: 0 },
  },
});

// ============================================================================
// RESOLUTION
// ============================================================================

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`);
}

/** Freeze an object graph in place. Already-frozen nodes are skipped. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate an already-parsed scoring configuration.
 * Returns a deep-frozen copy or throws ConfigurationError listing every issue.
 */
export function resolveScoringConfig(input: unknown): ScoringConfig {
  const result = ScoringConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigurationError(`Invalid scoring configuration: ${issues.join("; ")}`, issues);
  }
  return deepFreeze(result.data);
}

/**
 * Validate a full application configuration (scoring + AI + logging).
 */
export function resolveAppConfig(input: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return deepFreeze(result.data);
}
