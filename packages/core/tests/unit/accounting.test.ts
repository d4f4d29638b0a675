// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect, vi } from "vitest";
import { AccountingMonitor, permittedVenues, type PersistenceSink } from "../../src/router/accounting.js";
import { createRequest } from "../../src/router/router.js";
import type {
  AccountingEntry,
  AttemptRecord,
  ExecutionResult,
  RoutingDecision,
  RoutingStrategy,
  SensitivityLevel,
  Venue,
} from "../../src/types.js";

// ── Fixtures ─────────────────────────────────────────────────────────────────

const HOUR = 3_600_000;

const req = createRequest({ id: "req-1", content: "irrelevant", taskType: "bug_fixing" });

const decision = (
  level: SensitivityLevel,
  strategy: RoutingStrategy = "LOCAL_PREFERRED",
  confidence = 0.8,
): RoutingDecision => ({
  requestId: "req-1",
  strategy,
  primaryVenue: "local",
  fallbackChain: [],
  confidence,
  privacyScore: 1,
  costImpact: 0.00005,
  estimatedSavings: 0,
  performanceEstimate: 0.5,
  reasoning: "test",
  sensitivity: {
    level,
    compositeScore: 0,
    heuristicScore: 0,
    finalScore: 0,
    matchedCategories: [],
    recommendations: [],
    failedClosed: false,
  },
  capability: {
    taskType: "bug_fixing",
    complexity: "MEDIUM",
    tableComplexity: "MEDIUM",
    inferredComplexity: "SIMPLE",
    baseScore: 0.6,
    score: 0.6,
    tier: "MEDIUM",
    estimatedLatencyMs: 5000,
    usedDefaults: false,
  },
  costEstimate: {
    inputTokens: 12,
    outputTokens: 18,
    venues: {
      local: { fixedCost: 0.00005, variableCost: 0, totalCost: 0.00005 },
      cloud_direct: { fixedCost: 0, variableCost: 0.0002, totalCost: 0.0002 },
      cloud_anonymized: { fixedCost: 0, variableCost: 0.00022, totalCost: 0.00022 },
      hybrid: { fixedCost: 0.00005, variableCost: 0.0001, totalCost: 0.00015 },
    },
    baselineModel: "gpt-4",
    baselineCost: 0.001,
    pricingSource: "default",
  },
});

interface ResultFields {
  cost?: number;
  saved?: number;
  quality?: number;
  latency?: number;
  attempts?: AttemptRecord[];
}

const result = (
  venueUsed: Venue | null,
  { cost = 0.25, saved = 0.75, quality = 0.8, latency = 100, attempts = [] }: ResultFields = {},
): ExecutionResult => ({
  requestId: "req-1",
  output: venueUsed ? "done" : "",
  venueUsed,
  actualCost: venueUsed ? cost : 0,
  costSaved: venueUsed ? saved : 0,
  qualityScore: venueUsed ? quality : 0,
  latencyMs: latency,
  attempts,
  warnings: [],
  ...(venueUsed ? {} : { error: "routing_failed" as const, errorMessage: "All 1 venue attempt(s) failed" }),
});

function monitor(options: { windowHours?: number; sink?: PersistenceSink } = {}) {
  let now = Date.UTC(2026, 0, 1);
  const clock = { advance: (ms: number) => (now += ms) };
  const m = new AccountingMonitor({ windowHours: options.windowHours ?? 24, sink: options.sink, clock: () => now });
  return { m, clock };
}

// ── permittedVenues ──────────────────────────────────────────────────────────

describe("permittedVenues", () => {
  it("narrows with sensitivity", () => {
    expect(permittedVenues("HIGH")).toEqual(["local"]);
    expect(permittedVenues("MEDIUM")).toEqual(["local", "cloud_anonymized"]);
    expect(permittedVenues("LOW")).toEqual(["local", "cloud_anonymized", "cloud_direct", "hybrid"]);
  });
});

// ── Monitor ──────────────────────────────────────────────────────────────────

describe("AccountingMonitor", () => {
  it("starts empty and fully compliant", () => {
    const snap = monitor().m.snapshot();
    expect(snap.totalRequests).toBe(0);
    expect(snap.privacyComplianceRate).toBe(1);
    expect(snap.perVenueCounts).toEqual({ local: 0, cloud_anonymized: 0, cloud_direct: 0, hybrid: 0, none: 0 });
    expect(snap.takenAt).toBe("2026-01-01T00:00:00.000Z");
  });

  it("accumulates totals, counts and running averages", () => {
    const { m } = monitor();
    m.record(req, decision("LOW", "CLOUD_DIRECT", 0.6), result("cloud_direct", { latency: 100, quality: 0.6 }));
    m.record(req, decision("MEDIUM", "LOCAL_PREFERRED", 1.0), result("local", { latency: 300, quality: 1.0 }));

    const snap = m.snapshot();
    expect(snap.totalRequests).toBe(2);
    expect(snap.successfulRequests).toBe(2);
    expect(snap.failedRequests).toBe(0);
    expect(snap.totalCost).toBe(0.5);
    expect(snap.totalCostSaved).toBe(1.5);
    expect(snap.perVenueCounts.cloud_direct).toBe(1);
    expect(snap.perVenueCounts.local).toBe(1);
    expect(snap.perStrategyCounts.CLOUD_DIRECT).toBe(1);
    expect(snap.perStrategyCounts.LOCAL_PREFERRED).toBe(1);
    expect(snap.perSensitivityCounts).toEqual({ HIGH: 0, MEDIUM: 1, LOW: 1 });
    expect(snap.averageLatencyMs).toBe(200);
    expect(snap.averageQualityScore).toBeCloseTo(0.8, 10);
    expect(snap.averageConfidence).toBeCloseTo(0.8, 10);
  });

  it("counts failed requests under 'none' and tallies failed attempts", () => {
    const { m } = monitor();
    const attempts: AttemptRecord[] = [
      { venue: "local", backend: "local-stub", outcome: "timeout", latencyMs: 30 },
      { venue: "cloud_direct", backend: "cloud-stub", outcome: "error", latencyMs: 5 },
    ];
    m.record(req, decision("LOW"), result(null, { attempts }));
    m.record(req, decision("LOW"), result("local", {
      attempts: [
        { venue: "cloud_direct", backend: "cloud-stub", outcome: "low_quality", latencyMs: 5 },
        { venue: "local", backend: "local-stub", outcome: "success", latencyMs: 5 },
      ],
    }));

    const snap = m.snapshot();
    expect(snap.failedRequests).toBe(1);
    expect(snap.successfulRequests).toBe(1);
    expect(snap.perVenueCounts.none).toBe(1);
    expect(snap.failedAttempts).toBe(3);
  });

  it("counts a privacy violation when content ran on a venue its sensitivity forbids", () => {
    const { m } = monitor();
    m.record(req, decision("HIGH"), result("local"));
    m.record(req, decision("MEDIUM"), result("cloud_anonymized"));
    m.record(req, decision("MEDIUM"), result("cloud_direct"));
    m.record(req, decision("HIGH"), result(null));

    const snap = m.snapshot();
    expect(snap.privacyViolations).toBe(1);
    expect(snap.privacyComplianceRate).toBe(0.75);
  });

  it("evicts entries older than the rolling window", () => {
    const { m, clock } = monitor({ windowHours: 1 });
    m.record(req, decision("LOW"), result("local", { cost: 0.5, saved: 0.25 }));
    clock.advance(30 * 60_000);
    m.record(req, decision("LOW"), result("local", { cost: 0.25, saved: 0.5 }));
    clock.advance(30 * 60_000);

    let snap = m.snapshot();
    expect(snap.recentWindowHours).toBe(1);
    expect(snap.recentRequests).toBe(1);
    expect(snap.recentCost).toBe(0.25);
    expect(snap.recentCostSaved).toBe(0.5);
    expect(snap.totalRequests).toBe(2);

    clock.advance(HOUR);
    snap = m.snapshot();
    expect(snap.recentRequests).toBe(0);
    expect(snap.recentCost).toBe(0);
    expect(snap.totalCost).toBe(0.75);
  });

  it("returns snapshots that do not alias internal state", () => {
    const { m } = monitor();
    const snap = m.snapshot();
    snap.perVenueCounts.local = 99;
    expect(m.snapshot().perVenueCounts.local).toBe(0);
  });

  it("reset zeroes every counter and clears the window", () => {
    const { m } = monitor();
    m.record(req, decision("MEDIUM"), result("cloud_direct"));
    m.reset();

    const snap = m.snapshot();
    expect(snap.totalRequests).toBe(0);
    expect(snap.privacyViolations).toBe(0);
    expect(snap.totalCost).toBe(0);
    expect(snap.recentRequests).toBe(0);
    expect(snap.averageLatencyMs).toBe(0);
    expect(snap.perStrategyCounts.LOCAL_PREFERRED).toBe(0);
  });

  // ── Persistence ────────────────────────────────────────────────────────────

  describe("sink", () => {
    it("writes a metadata-only entry per request", () => {
      const entries: AccountingEntry[] = [];
      const { m } = monitor({ sink: { write: (e) => entries.push(e) } });
      m.record(req, decision("LOW", "CLOUD_DIRECT"), result("cloud_direct"));

      expect(entries).toEqual([
        {
          requestId: "req-1",
          timestamp: "2026-01-01T00:00:00.000Z",
          taskType: "bug_fixing",
          sensitivity: "LOW",
          strategy: "CLOUD_DIRECT",
          venueUsed: "cloud_direct",
          inputTokens: 12,
          actualCost: 0.25,
          baselineCost: 0.001,
          costSaved: 0.75,
          qualityScore: 0.8,
          latencyMs: 100,
          failedAttempts: 0,
        },
      ]);
      expect(JSON.stringify(entries)).not.toContain("irrelevant");
    });

    it("includes the error code of a failed request", () => {
      const write = vi.fn();
      const { m } = monitor({ sink: { write } });
      m.record(req, decision("LOW"), result(null));
      expect(write).toHaveBeenCalledWith(expect.objectContaining({ venueUsed: null, error: "routing_failed" }));
    });

    it("keeps counting when the sink throws", () => {
      const { m } = monitor({
        sink: {
          write: () => {
            throw new Error("disk full");
          },
        },
      });
      expect(() => m.record(req, decision("LOW"), result("local"))).not.toThrow();
      expect(m.snapshot().totalRequests).toBe(1);
    });
  });
});
