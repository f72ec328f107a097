/**
 * Rationale Service Circuit Breaker
 *
 * Per-run guard around the external rationale service. After
 * `failureThreshold` consecutive failed narrative requests the circuit opens
 * and rows skip the call; after `resetTimeoutMs` a single probe request is
 * allowed through (half-open).
 *
 * States:
 * - CLOSED: normal operation
 * - OPEN: service is failing, use the deterministic narrative
 * - HALF_OPEN: one probe in flight to test recovery
 *
 * @module triage/rationale-circuit-breaker
 */

import { infoLog, warnLog } from "./debug";

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  failureThreshold: number;
  /** Infinity keeps the circuit open for the rest of the run. */
  resetTimeoutMs: number;
  now?: () => number;
}

export interface CircuitStats {
  state: CircuitState;
  consecutiveFailures: number;
  totalRequests: number;
  totalFailures: number;
  skipped: number;
}

export class RationaleCircuitBreaker {
  private state: CircuitState = "closed";
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private halfOpenProbeInFlight = false;
  private totalRequests = 0;
  private totalFailures = 0;
  private skipped = 0;
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Whether a request may go out. In HALF_OPEN only one probe is allowed.
   */
  tryAcquire(): boolean {
    if (this.state === "closed") {
      this.totalRequests++;
      return true;
    }

    if (this.state === "open") {
      const elapsed = this.openedAt === null ? Infinity : this.now() - this.openedAt;
      if (elapsed >= this.options.resetTimeoutMs) {
        this.state = "half_open";
        infoLog("[Circuit-Breaker] rationale service: OPEN → HALF_OPEN (probing recovery)");
      } else {
        this.skipped++;
        return false;
      }
    }

    if (this.halfOpenProbeInFlight) {
      this.skipped++;
      return false;
    }
    this.halfOpenProbeInFlight = true;
    this.totalRequests++;
    return true;
  }

  recordSuccess(): void {
    if (this.state !== "closed") {
      infoLog("[Circuit-Breaker] rationale service: recovered, circuit CLOSED");
    }
    this.state = "closed";
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.halfOpenProbeInFlight = false;
  }

  recordFailure(): void {
    this.totalFailures++;
    this.consecutiveFailures++;
    this.halfOpenProbeInFlight = false;

    if (this.state === "half_open" || this.consecutiveFailures >= this.options.failureThreshold) {
      if (this.state !== "open") {
        warnLog(
          `[Circuit-Breaker] rationale service: circuit OPEN after ${this.consecutiveFailures} consecutive failure(s)`,
        );
      }
      this.state = "open";
      this.openedAt = this.now();
    }
  }

  getStats(): CircuitStats {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
      skipped: this.skipped,
    };
  }
}
