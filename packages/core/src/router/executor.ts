// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Executor — walks [primary, ...fallbackChain] until a venue succeeds.
 *
 * Each attempt runs under min(attemptTimeoutMs, remaining deadline) with an
 * AbortSignal chained to the caller's. Errors, timeouts and low-quality
 * results advance the chain; caller cancellation stops it.
 */

import type { BackendResult, ExecutionBackend, ExecutionBackends } from "../backends/base.js";
import { ExecutionBackendError, ExecutionCancelledError, ExecutionTimeoutError } from "../exceptions.js";
import type {
  AttemptOutcome,
  AttemptRecord,
  ExecutionErrorCode,
  ExecutionResult,
  RoutingDecision,
  RoutingRequest,
  Venue,
} from "../types.js";
import { componentLogger } from "../utils/logger.js";
import { Anonymizer } from "./anonymizer.js";

const log = componentLogger("executor");

export interface ExecutorOptions {
  attemptTimeoutMs: number;
  deadlineMs: number;
  qualityThreshold: number;
  hybridRemoteShare: number;
  clock?: () => number;
}

export interface ExecuteOptions {
  /** Caller cancellation: aborts the in-flight call and skips the remaining venues. */
  signal?: AbortSignal;
  qualityThreshold?: number;
}

interface VenueOutcome {
  backend: string;
  result: BackendResult;
  actualCost: number;
  warnings: string[];
}

/**
 * Run `work` with its own AbortSignal, rejecting with ExecutionTimeoutError after
 * `timeoutMs` or ExecutionCancelledError when `caller` aborts, whichever comes first.
 * The signal is aborted once `work` settles.
 */
export function runWithAbort<T>(
  backend: string,
  timeoutMs: number,
  caller: AbortSignal | undefined,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const fail = (err: Error): void => {
      controller.abort(err);
      reject(err);
    };
    const onCancel = (): void => fail(new ExecutionCancelledError(backend));
    if (caller?.aborted) {
      onCancel();
      return;
    }

    const timer = setTimeout(() => fail(new ExecutionTimeoutError(backend, timeoutMs)), timeoutMs);
    caller?.addEventListener("abort", onCancel, { once: true });

    void Promise.resolve()
      .then(() => work(controller.signal))
      .then(resolve, reject)
      .finally(() => {
        clearTimeout(timer);
        caller?.removeEventListener("abort", onCancel);
        // Calls still sharing the signal (the other hybrid half) stop with the attempt
        controller.abort();
      });
  });
}

/** Split content at a line boundary: the first part stays local, the rest goes remote. */
export function splitForHybrid(content: string, remoteShare: number): { local: string; remote: string } {
  const lines = content.split("\n");
  const cut = Math.round(lines.length * (1 - remoteShare));
  return { local: lines.slice(0, cut).join("\n"), remote: lines.slice(cut).join("\n") };
}

export class Executor {
  private readonly backends: ExecutionBackends;
  private readonly anonymizer: Anonymizer;
  private readonly options: ExecutorOptions;
  private readonly now: () => number;

  constructor(backends: ExecutionBackends, options: ExecutorOptions, anonymizer: Anonymizer = new Anonymizer()) {
    this.backends = backends;
    this.options = options;
    this.anonymizer = anonymizer;
    this.now = options.clock ?? Date.now;
  }

  /** Never rejects: failures are reported through `error` on the result. */
  async execute(
    request: RoutingRequest,
    decision: RoutingDecision,
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult> {
    const start = this.now();
    const deadline = start + this.options.deadlineMs;
    const threshold = options.qualityThreshold ?? request.preferences.qualityThreshold ?? this.options.qualityThreshold;
    const chain: Venue[] = [decision.primaryVenue, ...decision.fallbackChain];
    const attempts: AttemptRecord[] = [];
    const warnings: string[] = [];

    for (const [index, venue] of chain.entries()) {
      const isLast = index === chain.length - 1;
      const backend = this.backendLabel(venue);

      if (options.signal?.aborted) {
        attempts.push({ venue, backend, outcome: "cancelled", latencyMs: 0 });
        return this.failure(request, start, attempts, warnings, "cancelled", "Request cancelled by caller");
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        attempts.push({ venue, backend, outcome: "deadline", latencyMs: 0 });
        log.warn({ requestId: request.id, venue }, "deadline exhausted before attempt");
        return this.failure(
          request,
          start,
          attempts,
          warnings,
          "routing_failed",
          `Deadline of ${this.options.deadlineMs}ms exhausted after ${attempts.length - 1} attempt(s)`,
        );
      }

      const budget = Math.min(this.options.attemptTimeoutMs, remaining);
      const attemptStart = this.now();
      try {
        const outcome = await runWithAbort(backend, budget, options.signal, (signal) =>
          this.runVenue(venue, request, decision, { timeoutMs: budget, signal }),
        );
        const latencyMs = this.now() - attemptStart;
        const quality = outcome.result.qualityScore;

        if (quality < threshold && !isLast) {
          attempts.push({
            venue,
            backend: outcome.backend,
            outcome: "low_quality",
            latencyMs,
            message: `quality ${quality.toFixed(2)} below threshold ${threshold.toFixed(2)}`,
          });
          log.info({ requestId: request.id, venue, quality, threshold }, "low quality result, trying next venue");
          continue;
        }
        if (quality < threshold) {
          warnings.push(`Accepted ${venue} result with quality ${quality.toFixed(2)} below threshold ${threshold.toFixed(2)}`);
        }

        attempts.push({ venue, backend: outcome.backend, outcome: "success", latencyMs });
        warnings.push(...outcome.warnings);
        log.info(
          { requestId: request.id, venue, attempts: attempts.length, latencyMs, cost: outcome.actualCost },
          "executed",
        );
        return {
          requestId: request.id,
          output: outcome.result.output,
          venueUsed: venue,
          actualCost: outcome.actualCost,
          costSaved: decision.costEstimate.baselineCost - outcome.actualCost,
          qualityScore: quality,
          latencyMs: this.now() - start,
          attempts,
          warnings,
        };
      } catch (err) {
        const latencyMs = this.now() - attemptStart;
        const message = err instanceof Error ? err.message : String(err);
        if (err instanceof ExecutionCancelledError) {
          attempts.push({ venue, backend, outcome: "cancelled", latencyMs, message });
          log.info({ requestId: request.id, venue }, "cancelled by caller");
          return this.failure(request, start, attempts, warnings, "cancelled", "Request cancelled by caller");
        }
        const outcome: AttemptOutcome = err instanceof ExecutionTimeoutError ? "timeout" : "error";
        attempts.push({ venue, backend, outcome, latencyMs, message });
        log.warn({ requestId: request.id, venue, outcome, err: message }, "attempt failed");
      }
    }

    return this.failure(
      request,
      start,
      attempts,
      warnings,
      "routing_failed",
      attempts.length === 0 ? "No venue to try" : `All ${attempts.length} venue attempt(s) failed`,
    );
  }

  private async runVenue(
    venue: Venue,
    request: RoutingRequest,
    decision: RoutingDecision,
    call: { timeoutMs: number; signal: AbortSignal },
  ): Promise<VenueOutcome> {
    const estimate = decision.costEstimate.venues[venue];
    switch (venue) {
      case "local": {
        const backend = this.backends.local;
        const result = await backend.execute(request.content, request.taskType, call);
        return { backend: backend.name, result, actualCost: result.costUsd ?? estimate.totalCost, warnings: [] };
      }
      case "cloud_direct": {
        const backend = this.cloudBackend();
        const result = await backend.execute(request.content, request.taskType, call);
        return { backend: backend.name, result, actualCost: result.costUsd ?? estimate.totalCost, warnings: [] };
      }
      case "cloud_anonymized": {
        const backend = this.cloudBackend();
        const { text, mapping } = this.anonymizer.anonymize(request.content, request.id);
        const result = await backend.execute(text, request.taskType, call);
        const restored = this.anonymizer.restore(result.output, mapping);
        const warnings = restored.unresolved.map((p) => `Unresolved placeholder left in output: ${p}`);
        return {
          backend: backend.name,
          result: { ...result, output: restored.text },
          actualCost: result.costUsd ?? estimate.totalCost,
          warnings,
        };
      }
      case "hybrid": {
        const local = this.backends.local;
        const cloud = this.cloudBackend();
        const parts = splitForHybrid(request.content, this.options.hybridRemoteShare);
        const [localResult, cloudResult] = await Promise.all([
          parts.local ? local.execute(parts.local, request.taskType, call) : undefined,
          parts.remote ? cloud.execute(parts.remote, request.taskType, call) : undefined,
        ]);
        const results = [localResult, cloudResult].filter((r): r is BackendResult => r !== undefined);
        const localCost = localResult ? (localResult.costUsd ?? estimate.fixedCost) : 0;
        const cloudCost = cloudResult ? (cloudResult.costUsd ?? estimate.variableCost) : 0;
        return {
          backend: `${local.name}+${cloud.name}`,
          result: {
            output: results.map((r) => r.output).join("\n"),
            qualityScore: results.length > 0 ? Math.min(...results.map((r) => r.qualityScore)) : 0,
          },
          actualCost: localCost + cloudCost,
          warnings: [],
        };
      }
    }
  }

  private cloudBackend(): ExecutionBackend {
    if (!this.backends.cloud) {
      throw new ExecutionBackendError("cloud", "no remote backend configured");
    }
    return this.backends.cloud;
  }

  private backendLabel(venue: Venue): string {
    const cloud = this.backends.cloud?.name ?? "cloud";
    switch (venue) {
      case "local":
        return this.backends.local.name;
      case "cloud_direct":
      case "cloud_anonymized":
        return cloud;
      case "hybrid":
        return `${this.backends.local.name}+${cloud}`;
    }
  }

  private failure(
    request: RoutingRequest,
    start: number,
    attempts: AttemptRecord[],
    warnings: string[],
    error: ExecutionErrorCode,
    errorMessage: string,
  ): ExecutionResult {
    log.error({ requestId: request.id, error, attempts: attempts.length }, "execution failed");
    return {
      requestId: request.id,
      output: "",
      venueUsed: null,
      actualCost: 0,
      costSaved: 0,
      qualityScore: 0,
      latencyMs: this.now() - start,
      attempts,
      warnings,
      error,
      errorMessage,
    };
  }
}
