/**
 * Configuration Loader
 *
 * Resolves the active AppConfig: built-in profile → optional JSON config
 * file → TRIAGE_* environment overrides → schema validation. The result is
 * deep-frozen and read-only for the rest of the run.
 *
 * @module config-loader
 */

import * as fs from "fs";
import * as path from "path";

import {
  AppConfigSchema,
  ConfigurationError,
  DEFAULT_APP_CONFIG,
  PROFILE_NAMES,
  SCORING_PROFILES,
  isProfileName,
  resolveAppConfig,
  type AppConfig,
  type ProfileName,
} from "./config-schemas";
import { warnLog } from "./triage/debug";

// ============================================================================
// TYPES
// ============================================================================

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  appliedValue: string | number | boolean | null;
}

export interface LoadConfigOptions {
  configPath?: string;
  profile?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: AppConfig;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
  source: string;
}

type PlainObject = Record<string, unknown>;

// Override policy: "on" | "off" | "allowlist:VAR1,VAR2"
function getOverridePolicy(env: NodeJS.ProcessEnv): string {
  return env.TRIAGE_CONFIG_ENV_OVERRIDES || "on";
}

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

const ENV_MAP: Record<string, { fieldPath: string; parser: (v: string) => string | number | boolean | null }> = {
  TRIAGE_GREEN_MIN: { fieldPath: "scoring.tiers.greenMin", parser: (v) => parseFloat(v) },
  TRIAGE_AMBER_MIN: { fieldPath: "scoring.tiers.amberMin", parser: (v) => parseFloat(v) },
  TRIAGE_MIN_STUDIES: { fieldPath: "scoring.thresholds.minStudies", parser: (v) => parseInt(v, 10) },
  TRIAGE_AI_ENABLED: { fieldPath: "ai.enabled", parser: (v) => v === "true" },
  TRIAGE_AI_PROVIDER: { fieldPath: "ai.provider", parser: (v) => v },
  TRIAGE_AI_BASE_URL: { fieldPath: "ai.baseUrl", parser: (v) => v || null },
  TRIAGE_AI_MODEL: { fieldPath: "ai.model", parser: (v) => v },
  TRIAGE_AI_TIMEOUT_MS: { fieldPath: "ai.timeoutMs", parser: (v) => parseInt(v, 10) },
  TRIAGE_AI_RETRY_ATTEMPTS: { fieldPath: "ai.retryAttempts", parser: (v) => parseInt(v, 10) },
  TRIAGE_LOG_LEVEL: { fieldPath: "logging.level", parser: (v) => v },
  TRIAGE_CONCURRENCY: { fieldPath: "concurrency", parser: (v) => parseInt(v, 10) },
};

// ============================================================================
// HELPERS
// ============================================================================

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function cloneJson(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

/** Objects merge key by key; arrays and scalars replace. */
export function deepMerge(base: PlainObject, patch: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function setNestedValue(obj: PlainObject, fieldPath: string, value: unknown): void {
  const parts = fieldPath.split(".");
  let current = obj;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[part] = created;
      current = created;
    }
  }
  current[parts[parts.length - 1]] = value;
}

function readConfigFile(configPath: string): PlainObject {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Config file ${configPath} is not valid JSON: ${String(err)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

function resolveProfileName(requested: string | undefined, fromFile: unknown): ProfileName {
  const name = (requested ?? (typeof fromFile === "string" ? fromFile : "balanced")).toLowerCase();
  if (!isProfileName(name)) {
    throw new ConfigurationError(`Unknown profile '${name}'. Available: ${PROFILE_NAMES.join(", ")}`);
  }
  return name;
}

// ============================================================================
// OVERRIDE RESOLUTION
// ============================================================================

export function applyEnvOverrides(
  base: PlainObject,
  env: NodeJS.ProcessEnv,
): { result: PlainObject; overrides: OverrideRecord[]; skippedOverrides: string[] } {
  const policy = getOverridePolicy(env);
  const overrides: OverrideRecord[] = [];
  const skippedOverrides: string[] = [];

  if (policy === "off") {
    return { result: base, overrides, skippedOverrides };
  }

  let allowlist: Set<string> | null = null;
  if (policy.startsWith("allowlist:")) {
    allowlist = new Set(policy.slice("allowlist:".length).split(",").map((s) => s.trim()));
  }

  let result = base;
  for (const [envVar, mapping] of Object.entries(ENV_MAP)) {
    if (allowlist && !allowlist.has(envVar)) continue;

    const envValue = env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const parsed = mapping.parser(envValue);
    const tentative = cloneJson(result);
    if (!isPlainObject(tentative)) continue;
    setNestedValue(tentative, mapping.fieldPath, parsed);

    // Only accept overrides that keep the config valid
    const validation = AppConfigSchema.safeParse(tentative);
    if (!validation.success) {
      const message = validation.error.issues[0]?.message ?? "invalid";
      warnLog(`[Config-Loader] Skipping invalid override ${envVar}=${envValue}: ${message}`);
      skippedOverrides.push(`${envVar} (invalid: ${message})`);
      continue;
    }

    result = tentative;
    overrides.push({ envVar, fieldPath: mapping.fieldPath, appliedValue: parsed });
  }

  return { result, overrides, skippedOverrides };
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load the application config for a run.
 * Throws ConfigurationError for unknown profiles, unreadable files or any
 * schema violation.
 */
export function loadAppConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const fileData = options.configPath ? readConfigFile(options.configPath) : {};
  const profile = resolveProfileName(options.profile, fileData.profile);

  const base = cloneJson({ ...DEFAULT_APP_CONFIG, profile, scoring: SCORING_PROFILES[profile] });
  if (!isPlainObject(base)) {
    throw new ConfigurationError("Default configuration is not an object");
  }
  const merged = deepMerge(base, { ...fileData, profile });
  const { result, overrides, skippedOverrides } = applyEnvOverrides(merged, env);

  return {
    config: resolveAppConfig(result),
    overrides,
    skippedOverrides,
    source: options.configPath ?? "<defaults>",
  };
}

/**
 * Write each built-in profile as `<name>.json` for reference.
 */
export function dumpDefaultProfiles(destination: string): string[] {
  fs.mkdirSync(destination, { recursive: true });
  return PROFILE_NAMES.map((name) => {
    const file = path.join(destination, `${name}.json`);
    const content = { ...DEFAULT_APP_CONFIG, profile: name, scoring: SCORING_PROFILES[name] };
    fs.writeFileSync(file, JSON.stringify(content, null, 2) + "\n", "utf-8");
    return file;
  });
}
