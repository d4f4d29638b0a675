// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";
import { Executor, runWithAbort, splitForHybrid, type ExecutorOptions } from "../../src/router/executor.js";
import { CostModel } from "../../src/router/costModel.js";
import { createRequest } from "../../src/router/router.js";
import { defaultConfig } from "../../src/config/config.js";
import { PRICING_TABLE } from "../../src/config/tables.js";
import { ExecutionCancelledError } from "../../src/exceptions.js";
import type { ExecutionBackends } from "../../src/backends/base.js";
import type { RoutingDecision, Venue } from "../../src/types.js";
import { StubBackend, echo, fail, hang, ok } from "../helpers/stubs.js";

// ── Fixtures ─────────────────────────────────────────────────────────────────

const CONTENT = "def hello(): print('hi')";

// local 0.00005, direct 0.000105, hybrid fixed 0.00005; baseline (gpt-4) 0.00072
const cost = new CostModel(defaultConfig.cost, "gpt-4o", PRICING_TABLE).estimate(CONTENT);

const decisionFor = (primaryVenue: Venue, fallbackChain: Venue[] = []): RoutingDecision => ({
  requestId: "req-1",
  strategy: "LOCAL_PREFERRED",
  primaryVenue,
  fallbackChain,
  confidence: 0.8,
  privacyScore: 0.9,
  costImpact: cost.venues[primaryVenue].totalCost,
  estimatedSavings: 0,
  performanceEstimate: 0.5,
  reasoning: "test",
  sensitivity: {
    level: "LOW",
    compositeScore: 0,
    heuristicScore: 0,
    finalScore: 0,
    matchedCategories: [],
    recommendations: [],
    failedClosed: false,
  },
  capability: {
    taskType: "code_completion",
    complexity: "SIMPLE",
    tableComplexity: "SIMPLE",
    inferredComplexity: "SIMPLE",
    baseScore: 0.85,
    score: 1,
    tier: "HIGH",
    estimatedLatencyMs: 2000,
    usedDefaults: false,
  },
  costEstimate: cost,
});

const request = (content = CONTENT, qualityThreshold?: number) =>
  createRequest({
    id: "req-1",
    content,
    taskType: "code_completion",
    preferences: qualityThreshold === undefined ? {} : { qualityThreshold },
  });

const baseOptions: ExecutorOptions = {
  attemptTimeoutMs: 1000,
  deadlineMs: 5000,
  qualityThreshold: 0.7,
  hybridRemoteShare: 0.5,
};

function setup(
  localBehaviour = ok("local answer"),
  cloudBehaviour = ok("cloud answer"),
  options: Partial<ExecutorOptions> = {},
) {
  const local = new StubBackend("local-stub", "local", localBehaviour);
  const cloud = new StubBackend("cloud-stub", "remote", cloudBehaviour);
  const backends: ExecutionBackends = { local, cloud };
  const executor = new Executor(backends, { ...baseOptions, ...options });
  return { local, cloud, executor };
}

// ── Success path ─────────────────────────────────────────────────────────────

describe("Executor", () => {
  describe("success path", () => {
    it("returns the primary venue's output with estimated cost when the backend reports none", async () => {
      const { executor, cloud } = setup();
      const result = await executor.execute(request(), decisionFor("local", ["cloud_direct"]));

      expect(result.output).toBe("local answer");
      expect(result.venueUsed).toBe("local");
      expect(result.actualCost).toBe(0.00005);
      expect(result.costSaved).toBeCloseTo(0.00067, 10);
      expect(result.qualityScore).toBe(0.9);
      expect(result.error).toBeUndefined();
      expect(result.warnings).toEqual([]);
      expect(result.attempts).toHaveLength(1);
      expect(result.attempts[0]).toMatchObject({ venue: "local", backend: "local-stub", outcome: "success" });
      expect(cloud.calls).toEqual([]);
    });

    it("prefers the cost reported by the backend", async () => {
      const { executor } = setup(ok("x"), ok("cloud answer", { costUsd: 0.0002 }));
      const result = await executor.execute(request(), decisionFor("cloud_direct"));

      expect(result.venueUsed).toBe("cloud_direct");
      expect(result.actualCost).toBe(0.0002);
      expect(result.costSaved).toBeCloseTo(0.00052, 10);
    });

    it("sends the original content to the direct remote venue", async () => {
      const { executor, cloud } = setup();
      await executor.execute(request(), decisionFor("cloud_direct"));
      expect(cloud.calls).toEqual([CONTENT]);
    });
  });

  // ── Fallbacks ──────────────────────────────────────────────────────────────

  describe("fallback chain", () => {
    it("advances to the next venue when a backend fails", async () => {
      const { executor } = setup(fail("connection refused"));
      const result = await executor.execute(request(), decisionFor("local", ["cloud_direct"]));

      expect(result.venueUsed).toBe("cloud_direct");
      expect(result.output).toBe("cloud answer");
      expect(result.attempts.map((a) => a.outcome)).toEqual(["error", "success"]);
      expect(result.attempts[0]?.message).toBe("connection refused");
    });

    it("records a timeout and aborts the timed-out call", async () => {
      const { executor, local } = setup(hang, ok("cloud answer"), { attemptTimeoutMs: 20 });
      const result = await executor.execute(request(), decisionFor("local", ["cloud_direct"]));

      expect(result.venueUsed).toBe("cloud_direct");
      expect(result.attempts[0]).toMatchObject({
        venue: "local",
        outcome: "timeout",
        message: "Backend 'local-stub' timed out after 20ms",
      });
      expect(local.signals[0]?.aborted).toBe(true);
    });

    it("fails with routing_failed when every venue fails", async () => {
      const { executor } = setup(fail("down"), fail("also down"));
      const result = await executor.execute(request(), decisionFor("local", ["cloud_direct"]));

      expect(result.error).toBe("routing_failed");
      expect(result.errorMessage).toBe("All 2 venue attempt(s) failed");
      expect(result.venueUsed).toBeNull();
      expect(result.output).toBe("");
      expect(result.actualCost).toBe(0);
      expect(result.costSaved).toBe(0);
      expect(result.qualityScore).toBe(0);
      expect(result.attempts.map((a) => a.outcome)).toEqual(["error", "error"]);
    });

    it("treats a missing remote backend as a failed attempt", async () => {
      const local = new StubBackend("local-stub", "local", ok("local answer"));
      const executor = new Executor({ local }, baseOptions);
      const result = await executor.execute(request(), decisionFor("cloud_direct", ["local"]));

      expect(result.venueUsed).toBe("local");
      expect(result.attempts[0]).toMatchObject({
        venue: "cloud_direct",
        backend: "cloud",
        outcome: "error",
        message: "Backend 'cloud' failed: no remote backend configured",
      });
    });
  });

  // ── Quality ────────────────────────────────────────────────────────────────

  describe("quality threshold", () => {
    it("advances past a low-quality result", async () => {
      const { executor } = setup(ok("meh", { qualityScore: 0.4 }));
      const result = await executor.execute(request(), decisionFor("local", ["cloud_direct"]));

      expect(result.venueUsed).toBe("cloud_direct");
      expect(result.attempts[0]).toMatchObject({
        outcome: "low_quality",
        message: "quality 0.40 below threshold 0.70",
      });
      expect(result.warnings).toEqual([]);
    });

    it("accepts a low-quality result from the last venue with a warning", async () => {
      const { executor } = setup(ok("meh", { qualityScore: 0.4 }));
      const result = await executor.execute(request(), decisionFor("local"));

      expect(result.venueUsed).toBe("local");
      expect(result.output).toBe("meh");
      expect(result.warnings).toEqual(["Accepted local result with quality 0.40 below threshold 0.70"]);
    });

    it("uses the request's threshold over the configured one", async () => {
      const { executor } = setup(ok("fine", { qualityScore: 0.4 }));
      const result = await executor.execute(request(CONTENT, 0.3), decisionFor("local", ["cloud_direct"]));

      expect(result.venueUsed).toBe("local");
      expect(result.warnings).toEqual([]);
    });

    it("uses the call option's threshold over the request's", async () => {
      const { executor } = setup(ok("fine", { qualityScore: 0.4 }));
      const result = await executor.execute(request(CONTENT, 0.3), decisionFor("local"), { qualityThreshold: 0.95 });

      expect(result.warnings).toEqual(["Accepted local result with quality 0.40 below threshold 0.95"]);
    });
  });

  // ── Cancellation and deadline ──────────────────────────────────────────────

  describe("cancellation", () => {
    it("stops the chain when the caller aborts mid-call", async () => {
      const { executor, local, cloud } = setup(hang);
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      const result = await executor.execute(request(), decisionFor("local", ["cloud_direct"]), {
        signal: controller.signal,
      });

      expect(result.error).toBe("cancelled");
      expect(result.errorMessage).toBe("Request cancelled by caller");
      expect(result.attempts.map((a) => a.outcome)).toEqual(["cancelled"]);
      expect(local.signals[0]?.aborted).toBe(true);
      expect(cloud.calls).toEqual([]);
    });

    it("does not call any backend when already aborted", async () => {
      const { executor, local } = setup();
      const controller = new AbortController();
      controller.abort();

      const result = await executor.execute(request(), decisionFor("local"), { signal: controller.signal });

      expect(result.error).toBe("cancelled");
      expect(result.attempts).toEqual([{ venue: "local", backend: "local-stub", outcome: "cancelled", latencyMs: 0 }]);
      expect(local.calls).toEqual([]);
    });
  });

  describe("deadline", () => {
    it("stops once the overall deadline is spent", async () => {
      let now = 0;
      const slowFailure = async (): Promise<never> => {
        now += 100;
        throw new Error("slow failure");
      };
      const { executor, cloud } = setup(slowFailure, slowFailure, { deadlineMs: 150, clock: () => now });

      const result = await executor.execute(request(), decisionFor("local", ["cloud_direct", "cloud_anonymized"]));

      expect(result.error).toBe("routing_failed");
      expect(result.errorMessage).toBe("Deadline of 150ms exhausted after 2 attempt(s)");
      expect(result.attempts.map((a) => a.outcome)).toEqual(["error", "error", "deadline"]);
      expect(result.attempts[0]?.latencyMs).toBe(100);
      expect(result.latencyMs).toBe(200);
      expect(cloud.calls).toHaveLength(1);
    });
  });

  // ── Anonymized venue ───────────────────────────────────────────────────────

  describe("anonymized venue", () => {
    const SECRETIVE = "const userName = 'alice smith';";

    it("masks content before the call and restores the output", async () => {
      const { executor, cloud } = setup(ok("x"), echo());
      const result = await executor.execute(request(SECRETIVE), decisionFor("cloud_anonymized"));

      expect(cloud.calls[0]).toMatch(/^const anon_[0-9a-f]{8}_id1 = 'anon_[0-9a-f]{8}_str1';$/);
      expect(result.output).toBe(SECRETIVE);
      expect(result.venueUsed).toBe("cloud_anonymized");
      expect(result.warnings).toEqual([]);
    });

    it("warns about placeholders it cannot restore", async () => {
      const { executor } = setup(ok("x"), ok("see anon_deadbeef_id7"));
      const result = await executor.execute(request(SECRETIVE), decisionFor("cloud_anonymized"));

      expect(result.output).toBe("see anon_deadbeef_id7");
      expect(result.warnings).toEqual(["Unresolved placeholder left in output: anon_deadbeef_id7"]);
    });
  });

  // ── Hybrid venue ───────────────────────────────────────────────────────────

  describe("hybrid venue", () => {
    it("splits by line, runs both parts and joins the outputs", async () => {
      const { executor, local, cloud } = setup(
        async (content) => ({ output: `L:${content}`, qualityScore: 0.8 }),
        async (content) => ({ output: `C:${content}`, qualityScore: 0.95, costUsd: 0.0001 }),
      );
      const result = await executor.execute(request("line1\nline2\nline3\nline4"), decisionFor("hybrid"));

      expect(local.calls).toEqual(["line1\nline2"]);
      expect(cloud.calls).toEqual(["line3\nline4"]);
      expect(result.output).toBe("L:line1\nline2\nC:line3\nline4");
      expect(result.qualityScore).toBe(0.8);
      expect(result.actualCost).toBeCloseTo(0.00015, 10);
      expect(result.attempts[0]).toMatchObject({ venue: "hybrid", backend: "local-stub+cloud-stub" });
    });

    it("aborts the remote half when the local half fails", async () => {
      const { executor, cloud } = setup(fail("local down"), hang);
      const result = await executor.execute(request("line1\nline2\nline3\nline4"), decisionFor("hybrid"));

      expect(result.attempts[0]).toMatchObject({ venue: "hybrid", outcome: "error" });
      expect(cloud.signals[0]?.aborted).toBe(true);
      expect(result.error).toBe("routing_failed");
    });

    it("sends the remote half without anonymizing it", async () => {
      const { executor, cloud } = setup(ok("L"), ok("C"));
      await executor.execute(request("a\nsecret_name = 1"), decisionFor("hybrid"));
      expect(cloud.calls).toEqual(["secret_name = 1"]);
    });

    it("skips the remote call when there is nothing to send", async () => {
      const { executor, cloud } = setup();
      const result = await executor.execute(request("only one line"), decisionFor("hybrid"));

      expect(cloud.calls).toEqual([]);
      expect(result.output).toBe("local answer");
    });
  });
});

// ── Helpers ──────────────────────────────────────────────────────────────────

describe("splitForHybrid", () => {
  it("keeps the leading share local", () => {
    expect(splitForHybrid("a\nb\nc\nd", 0.5)).toEqual({ local: "a\nb", remote: "c\nd" });
    expect(splitForHybrid("a\nb\nc", 0.25)).toEqual({ local: "a\nb", remote: "c" });
  });

  it("keeps a single line local", () => {
    expect(splitForHybrid("abc", 0.5)).toEqual({ local: "abc", remote: "" });
  });
});

describe("runWithAbort", () => {
  it("resolves with the work's value", async () => {
    await expect(runWithAbort("b", 1000, undefined, async () => 42)).resolves.toBe(42);
  });

  it("aborts the work's signal once the work settles", async () => {
    let seen: AbortSignal | undefined;
    await expect(
      runWithAbort("b", 1000, undefined, async (signal) => {
        seen = signal;
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(seen?.aborted).toBe(true);
  });

  it("rejects without starting work when the caller already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    let started = false;
    const run = runWithAbort("b", 1000, controller.signal, async () => {
      started = true;
      return 1;
    });
    await expect(run).rejects.toBeInstanceOf(ExecutionCancelledError);
    expect(started).toBe(false);
  });
});
