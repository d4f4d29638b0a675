// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * AccountingMonitor — process-wide cost, savings and compliance ledger.
 *
 * record() is synchronous, so each update is atomic on the event loop.
 * snapshot() returns a copy. A rolling window of recent entries is kept as a
 * time-ordered queue and evicted from the head.
 *
 * PRIVACY: only metadata is recorded. Request content is NEVER stored.
 */

import type {
  AccountingEntry,
  AccountingSnapshot,
  ExecutionResult,
  RoutingDecision,
  RoutingRequest,
  RoutingStrategy,
  SensitivityLevel,
  Venue,
} from "../types.js";
import { componentLogger } from "../utils/logger.js";

const log = componentLogger("accounting");

/** Receives every accounting entry, e.g. for durable storage. */
export interface PersistenceSink {
  write(entry: AccountingEntry): void;
}

export interface AccountingOptions {
  windowHours: number;
  sink?: PersistenceSink;
  clock?: () => number;
}

/** Venues that may carry content of the given sensitivity. */
export function permittedVenues(level: SensitivityLevel): readonly Venue[] {
  switch (level) {
    case "HIGH":
      return ["local"];
    case "MEDIUM":
      return ["local", "cloud_anonymized"];
    case "LOW":
      return ["local", "cloud_anonymized", "cloud_direct", "hybrid"];
  }
}

interface WindowEntry {
  at: number;
  cost: number;
  costSaved: number;
}

function zeroVenueCounts(): Record<Venue | "none", number> {
  return { local: 0, cloud_anonymized: 0, cloud_direct: 0, hybrid: 0, none: 0 };
}

function zeroStrategyCounts(): Record<RoutingStrategy, number> {
  return {
    LOCAL_ONLY: 0,
    LOCAL_FORCED: 0,
    LOCAL_PREFERRED: 0,
    CLOUD_ANONYMIZED: 0,
    CLOUD_DIRECT: 0,
    HYBRID: 0,
  };
}

function zeroSensitivityCounts(): Record<SensitivityLevel, number> {
  return { HIGH: 0, MEDIUM: 0, LOW: 0 };
}

export class AccountingMonitor {
  private readonly windowMs: number;
  private readonly windowHours: number;
  private readonly sink?: PersistenceSink;
  private readonly now: () => number;

  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;
  private failedAttempts = 0;
  private perVenueCounts = zeroVenueCounts();
  private perStrategyCounts = zeroStrategyCounts();
  private perSensitivityCounts = zeroSensitivityCounts();
  private totalCost = 0;
  private totalCostSaved = 0;
  private privacyViolations = 0;
  private averageLatencyMs = 0;
  private averageQualityScore = 0;
  private averageConfidence = 0;
  private window: WindowEntry[] = [];

  constructor(options: AccountingOptions) {
    this.windowHours = options.windowHours;
    this.windowMs = options.windowHours * 3_600_000;
    this.sink = options.sink;
    this.now = options.clock ?? Date.now;
  }

  record(request: RoutingRequest, decision: RoutingDecision, result: ExecutionResult): void {
    const at = this.now();
    const n = ++this.totalRequests;

    if (result.venueUsed === null) {
      this.failedRequests++;
      this.perVenueCounts.none++;
    } else {
      this.successfulRequests++;
      this.perVenueCounts[result.venueUsed]++;
      if (!permittedVenues(decision.sensitivity.level).includes(result.venueUsed)) {
        this.privacyViolations++;
        log.error(
          { requestId: result.requestId, level: decision.sensitivity.level, venue: result.venueUsed },
          "privacy violation recorded",
        );
      }
    }

    const failed = result.attempts.filter((a) => a.outcome !== "success").length;
    this.failedAttempts += failed;
    this.perStrategyCounts[decision.strategy]++;
    this.perSensitivityCounts[decision.sensitivity.level]++;
    this.totalCost += result.actualCost;
    this.totalCostSaved += result.costSaved;

    this.averageLatencyMs += (result.latencyMs - this.averageLatencyMs) / n;
    this.averageQualityScore += (result.qualityScore - this.averageQualityScore) / n;
    this.averageConfidence += (decision.confidence - this.averageConfidence) / n;

    this.window.push({ at, cost: result.actualCost, costSaved: result.costSaved });
    this.evict(at);

    this.persist({
      requestId: result.requestId,
      timestamp: new Date(at).toISOString(),
      taskType: request.taskType,
      sensitivity: decision.sensitivity.level,
      strategy: decision.strategy,
      venueUsed: result.venueUsed,
      inputTokens: decision.costEstimate.inputTokens,
      actualCost: result.actualCost,
      baselineCost: decision.costEstimate.baselineCost,
      costSaved: result.costSaved,
      qualityScore: result.qualityScore,
      latencyMs: result.latencyMs,
      failedAttempts: failed,
      ...(result.error ? { error: result.error } : {}),
    });
  }

  snapshot(): AccountingSnapshot {
    const at = this.now();
    this.evict(at);
    const recent = this.window.reduce(
      (acc, e) => ({ cost: acc.cost + e.cost, costSaved: acc.costSaved + e.costSaved }),
      { cost: 0, costSaved: 0 },
    );

    return {
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      failedAttempts: this.failedAttempts,
      perVenueCounts: { ...this.perVenueCounts },
      perStrategyCounts: { ...this.perStrategyCounts },
      perSensitivityCounts: { ...this.perSensitivityCounts },
      totalCost: this.totalCost,
      totalCostSaved: this.totalCostSaved,
      privacyViolations: this.privacyViolations,
      privacyComplianceRate:
        this.totalRequests === 0 ? 1 : 1 - this.privacyViolations / this.totalRequests,
      averageLatencyMs: this.averageLatencyMs,
      averageQualityScore: this.averageQualityScore,
      averageConfidence: this.averageConfidence,
      recentWindowHours: this.windowHours,
      recentRequests: this.window.length,
      recentCost: recent.cost,
      recentCostSaved: recent.costSaved,
      takenAt: new Date(at).toISOString(),
    };
  }

  /** Admin action: zero every counter and clear the window. */
  reset(): void {
    this.totalRequests = 0;
    this.successfulRequests = 0;
    this.failedRequests = 0;
    this.failedAttempts = 0;
    this.perVenueCounts = zeroVenueCounts();
    this.perStrategyCounts = zeroStrategyCounts();
    this.perSensitivityCounts = zeroSensitivityCounts();
    this.totalCost = 0;
    this.totalCostSaved = 0;
    this.privacyViolations = 0;
    this.averageLatencyMs = 0;
    this.averageQualityScore = 0;
    this.averageConfidence = 0;
    this.window = [];
    log.info("statistics reset");
  }

  private evict(at: number): void {
    const cutoff = at - this.windowMs;
    let drop = 0;
    while (drop < this.window.length && (this.window[drop]?.at ?? Infinity) <= cutoff) drop++;
    if (drop > 0) this.window.splice(0, drop);
  }

  private persist(entry: AccountingEntry): void {
    if (!this.sink) return;
    try {
      this.sink.write(entry);
    } catch (err) {
      log.error({ requestId: entry.requestId, err: err instanceof Error ? err.message : String(err) }, "sink write failed");
    }
  }
}
