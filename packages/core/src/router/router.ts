// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * PrivacyRouter — the orchestration facade.
 *
 * Pipeline:
 *   1. Validate and freeze the request
 *   2. Classifier, capability estimator and cost model (concurrent)
 *   3. Policy decision → primary venue + fallback chain
 *   4. Execute along the chain (anonymizing where required)
 *   5. Record the outcome in the accounting ledger
 */

import { randomUUID } from "crypto";

import { z } from "zod";

import type { ExecutionBackends } from "../backends/base.js";
import { defaultConfig } from "../config/config.js";
import { CAPABILITY_TABLE, DECISION_TABLE, PRICING_TABLE, type DecisionTable } from "../config/tables.js";
import { InvalidRequestError, RoutingError, TollgateError } from "../exceptions.js";
import type {
  AccountingSnapshot,
  CapabilityEntry,
  ExecutionResult,
  ModelPricing,
  RoutingDecision,
  RoutingRequest,
  TollgateConfig,
} from "../types.js";
import { componentLogger } from "../utils/logger.js";
import { deepFreeze } from "../utils/security.js";
import { AccountingMonitor, type PersistenceSink } from "./accounting.js";
import { Anonymizer } from "./anonymizer.js";
import { CapabilityEstimator } from "./capability.js";
import { SensitivityClassifier, type SensitivityScorer } from "./classifier.js";
import { CostModel } from "./costModel.js";
import { Executor } from "./executor.js";
import { PolicyDecisionMatrix } from "./policy.js";

const log = componentLogger("router");

// ── Requests ─────────────────────────────────────────────────────────────────

const unit = z.number().min(0).max(1);

const RequestSchema = z.object({
  id: z.string().min(1).optional(),
  content: z.string(),
  taskType: z.string().min(1),
  preferences: z
    .object({
      costPriority: unit.optional(),
      qualityThreshold: unit.optional(),
    })
    .default({}),
});

export type RequestInput = z.input<typeof RequestSchema>;

/** Validate and freeze a request. Assigns a UUID when no id is given. */
export function createRequest(input: RequestInput): RoutingRequest {
  const parsed = RequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequestError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "request"}: ${i.message}`),
    );
  }
  const { id, content, taskType, preferences } = parsed.data;
  return Object.freeze({
    id: id ?? randomUUID(),
    content,
    taskType,
    preferences: Object.freeze(preferences),
  });
}

// ── Router ───────────────────────────────────────────────────────────────────

export interface PrivacyRouterDeps {
  scorer?: SensitivityScorer;
  sink?: PersistenceSink;
  clock?: () => number;
  /** Replaces the built-in decision table. */
  decisionTable?: DecisionTable;
}

export interface RouteOptions {
  /** Caller cancellation for routeAndExecute. */
  signal?: AbortSignal;
}

export class PrivacyRouter {
  readonly config: Readonly<TollgateConfig>;
  private readonly backends: ExecutionBackends;
  private readonly classifier: SensitivityClassifier;
  private readonly estimator: CapabilityEstimator;
  private readonly costModel: CostModel;
  private readonly policy: PolicyDecisionMatrix;
  private readonly executor: Executor;
  private readonly accounting: AccountingMonitor;

  constructor(backends: ExecutionBackends, config: TollgateConfig = defaultConfig, deps: PrivacyRouterDeps = {}) {
    this.config = deepFreeze(structuredClone(config));
    this.backends = backends;

    const capabilityTable = deepFreeze<Record<string, CapabilityEntry>>({
      ...CAPABILITY_TABLE,
      ...structuredClone(config.capability.overrides),
    });
    const pricing = deepFreeze<Record<string, ModelPricing>>({
      ...PRICING_TABLE,
      ...structuredClone(config.cost.pricing),
    });
    const decisionTable = deepFreeze(structuredClone(deps.decisionTable ?? DECISION_TABLE));

    const { router } = this.config;
    this.classifier = new SensitivityClassifier(this.config.classifier, deps.scorer);
    this.estimator = new CapabilityEstimator(capabilityTable);
    this.costModel = new CostModel(this.config.cost, this.config.cloud.model, pricing);
    this.policy = new PolicyDecisionMatrix(
      {
        privacyMode: router.privacyMode,
        costPriority: router.costPriority,
        anonymizationEnabled: router.anonymizationEnabled,
        maxCloudCostPerRequest: router.maxCloudCostPerRequest,
        maxFallbacks: router.maxFallbacks,
        cloudAvailable: backends.cloud !== undefined,
      },
      decisionTable,
    );
    this.executor = new Executor(
      backends,
      {
        attemptTimeoutMs: router.attemptTimeoutMs,
        deadlineMs: router.deadlineMs,
        qualityThreshold: router.qualityThreshold,
        hybridRemoteShare: this.config.cost.hybridRemoteShare,
        clock: deps.clock,
      },
      new Anonymizer(),
    );
    this.accounting = new AccountingMonitor({
      windowHours: this.config.accounting.windowHours,
      sink: deps.sink,
      clock: deps.clock,
    });

    log.debug(
      { privacyMode: router.privacyMode, local: backends.local.name, cloud: backends.cloud?.name ?? "none" },
      "router ready",
    );
  }

  /** Decision only, no execution. Rejects with InvalidRequestError or RoutingError. */
  async route(input: RequestInput): Promise<RoutingDecision> {
    const request = createRequest(input);
    return this.decide(request);
  }

  /** Route, execute and record. Never rejects. */
  async routeAndExecute(input: RequestInput, options: RouteOptions = {}): Promise<ExecutionResult> {
    let request: RoutingRequest;
    try {
      request = createRequest(input);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn({ err: message }, "rejected invalid request");
      // Plain JavaScript callers may pass anything here
      const id: unknown = input?.id;
      return emptyResult(typeof id === "string" ? id : "", "invalid_request", message);
    }

    let decision: RoutingDecision;
    try {
      decision = await this.decide(request);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return emptyResult(request.id, "routing_failed", message);
    }

    const result = await this.executor.execute(request, decision, { signal: options.signal });
    this.accounting.record(request, decision, result);
    return result;
  }

  report(): AccountingSnapshot {
    return this.accounting.snapshot();
  }

  /** Admin action. */
  resetStatistics(): void {
    this.accounting.reset();
  }

  /** Reachability of every configured backend, keyed by role. */
  async healthCheck(): Promise<{ local: boolean; cloud: boolean | null }> {
    const [local, cloud] = await Promise.all([
      this.backends.local.healthCheck().catch(() => false),
      this.backends.cloud ? this.backends.cloud.healthCheck().catch(() => false) : Promise.resolve(null),
    ]);
    return { local, cloud };
  }

  private async decide(request: RoutingRequest): Promise<RoutingDecision> {
    try {
      const [sensitivity, capability, cost] = await Promise.all([
        Promise.resolve().then(() => this.classifier.classify(request.content)),
        Promise.resolve().then(() => this.estimator.estimate(request.taskType, request.content)),
        Promise.resolve().then(() => this.costModel.estimate(request.content)),
      ]);
      const decision = this.policy.decide(request.id, sensitivity, capability, cost, request.preferences);
      log.info(
        {
          requestId: request.id,
          sensitivity: sensitivity.level,
          strategy: decision.strategy,
          venue: decision.primaryVenue,
          fallbacks: decision.fallbackChain,
        },
        "routed",
      );
      return decision;
    } catch (err) {
      if (err instanceof TollgateError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      log.error({ requestId: request.id, err: message }, "routing fault");
      throw new RoutingError(request.id, message);
    }
  }
}

function emptyResult(
  requestId: string,
  error: NonNullable<ExecutionResult["error"]>,
  errorMessage: string,
): ExecutionResult {
  return {
    requestId,
    output: "",
    venueUsed: null,
    actualCost: 0,
    costSaved: 0,
    qualityScore: 0,
    latencyMs: 0,
    attempts: [],
    warnings: [],
    error,
    errorMessage,
  };
}
