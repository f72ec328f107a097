/**
 * Error Classification
 *
 * Classifies failures of the external rationale service into ServiceError
 * kinds so the rationale generator can decide whether to retry and which
 * fallback reason to record.
 *
 * @module error-classification
 */

export type ServiceErrorKind = "network" | "auth" | "timeout" | "rate_limit" | "malformed_response";

/**
 * Per-row, non-fatal failure of the external rationale service.
 */
export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly kind: ServiceErrorKind,
    public readonly statusCode: number | null = null,
  ) {
    super(message);
    this.name = "ServiceError";
  }

  get retriable(): boolean {
    return this.kind === "network" || this.kind === "timeout" || this.kind === "rate_limit";
  }
}

/** Patterns indicating provider rate limiting or overload */
const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/i,
];

const MALFORMED_PATTERNS = [
  /invalid\s*json/i,
  /unexpected\s*token/i,
  /malformed/i,
  /empty\s*response/i,
  /no\s*content/i,
];

function readStatusCode(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  const status = "statusCode" in error ? error.statusCode : "status" in error ? error.status : undefined;
  return typeof status === "number" ? status : null;
}

/** Message for any thrown value; objects without a usable toString get a placeholder. */
function describeThrown(error: unknown): string {
  if (error instanceof Error) return error.message;
  try {
    return String(error);
  } catch {
    return "unknown error";
  }
}

/**
 * Map any thrown value to a ServiceError. ServiceErrors pass through unchanged.
 */
export function classifyServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) return error;

  const msg = describeThrown(error);
  const name = error instanceof Error ? error.name : "";
  const statusCode = readStatusCode(error);

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return new ServiceError(msg, "timeout", statusCode);
  }

  if (statusCode !== null) {
    if (statusCode === 401 || statusCode === 403) {
      return new ServiceError(msg, "auth", statusCode);
    }
    if (statusCode === 429 || statusCode === 529 || statusCode === 503) {
      return new ServiceError(msg, "rate_limit", statusCode);
    }
  }

  if (AUTH_PATTERNS.some((p) => p.test(msg))) {
    return new ServiceError(msg, "auth", statusCode);
  }

  if (RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return new ServiceError(msg, "rate_limit", statusCode);
  }

  if (name === "SyntaxError" || MALFORMED_PATTERNS.some((p) => p.test(msg))) {
    return new ServiceError(msg, "malformed_response", statusCode);
  }

  // Everything else (connection resets, DNS failures, 5xx) is treated as transport
  return new ServiceError(msg, "network", statusCode);
}
