// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Core shared types for Tollgate.
 * The classifier, estimator, cost model, policy, executor and accounting
 * monitor all operate on these types.
 */

export type SensitivityLevel = "HIGH" | "MEDIUM" | "LOW";

export type ComplexityClass = "SIMPLE" | "MEDIUM" | "COMPLEX" | "ULTRA_COMPLEX";

export type CapabilityTier = "HIGH" | "MEDIUM" | "LOW";

/** Where a unit of work can run. */
export type Venue = "local" | "cloud_anonymized" | "cloud_direct" | "hybrid";

export const VENUES: readonly Venue[] = ["local", "cloud_anonymized", "cloud_direct", "hybrid"];

export type RoutingStrategy =
  | "LOCAL_ONLY"
  | "LOCAL_FORCED"
  | "LOCAL_PREFERRED"
  | "CLOUD_ANONYMIZED"
  | "CLOUD_DIRECT"
  | "HYBRID";

export type PrivacyMode = "strict" | "balanced" | "permissive";

export type SensitivityCategory =
  | "critical_secrets"
  | "personal_data"
  | "infrastructure"
  | "business_secrets";

// ── Request ──────────────────────────────────────────────────────────────────

export interface RequestPreferences {
  /** 0.0 = quality first, 1.0 = cost first. Overrides router.costPriority. */
  costPriority?: number;
  /** Minimum acceptable backend quality score. Overrides router.qualityThreshold. */
  qualityThreshold?: number;
}

export interface RoutingRequest {
  readonly id: string;
  readonly content: string;
  readonly taskType: string;
  readonly preferences: Readonly<RequestPreferences>;
}

// ── Classification ───────────────────────────────────────────────────────────

export interface CategoryMatch {
  category: SensitivityCategory;
  patternId: string;
  matchCount: number;
}

export interface SensitivityReport {
  level: SensitivityLevel;
  /** Σ matchCount × severity over every matched pattern. */
  compositeScore: number;
  /** Output of the pluggable SensitivityScorer (0–10). */
  heuristicScore: number;
  /** Weighted blend of composite and heuristic scores. */
  finalScore: number;
  matchedCategories: CategoryMatch[];
  recommendations: string[];
  /** True when an internal fault forced the HIGH level. */
  failedClosed: boolean;
}

// ── Capability ───────────────────────────────────────────────────────────────

export interface CapabilityAssessment {
  taskType: string;
  /** The more severe of tableComplexity and inferredComplexity. */
  complexity: ComplexityClass;
  tableComplexity: ComplexityClass;
  inferredComplexity: ComplexityClass;
  baseScore: number;
  /** Base score adjusted by the complexity multiplier, clamped to [0, 1]. */
  score: number;
  tier: CapabilityTier;
  estimatedLatencyMs: number;
  /** True when the task type was missing from the capability table. */
  usedDefaults: boolean;
}

// ── Cost ─────────────────────────────────────────────────────────────────────

export interface VenueCost {
  fixedCost: number;
  variableCost: number;
  totalCost: number;
}

export interface CostEstimate {
  inputTokens: number;
  outputTokens: number;
  venues: Record<Venue, VenueCost>;
  /** Most expensive priced remote model — the savings reference. */
  baselineModel: string;
  baselineCost: number;
  pricingSource: "configured" | "default";
}

// ── Decision ─────────────────────────────────────────────────────────────────

export interface RoutingDecision {
  readonly requestId: string;
  readonly strategy: RoutingStrategy;
  readonly primaryVenue: Venue;
  readonly fallbackChain: readonly Venue[];
  readonly confidence: number;
  readonly privacyScore: number;
  /** Estimated cost (USD) of the primary venue. */
  readonly costImpact: number;
  /** Baseline cost minus costImpact. */
  readonly estimatedSavings: number;
  /** 0.1–1.0, higher is faster. */
  readonly performanceEstimate: number;
  /** Human-readable, diagnostic only. */
  readonly reasoning: string;
  readonly sensitivity: SensitivityReport;
  readonly capability: CapabilityAssessment;
  readonly costEstimate: CostEstimate;
}

// ── Execution ────────────────────────────────────────────────────────────────

export type AttemptOutcome = "success" | "error" | "timeout" | "low_quality" | "cancelled" | "deadline";

export interface AttemptRecord {
  venue: Venue;
  backend: string;
  outcome: AttemptOutcome;
  latencyMs: number;
  message?: string;
}

export type ExecutionErrorCode = "routing_failed" | "cancelled" | "invalid_request";

export interface ExecutionResult {
  requestId: string;
  output: string;
  venueUsed: Venue | null;
  /** USD actually spent by the successful attempt. */
  actualCost: number;
  /** Baseline cost minus actualCost; 0 when nothing ran. */
  costSaved: number;
  qualityScore: number;
  latencyMs: number;
  attempts: AttemptRecord[];
  warnings: string[];
  error?: ExecutionErrorCode;
  errorMessage?: string;
}

// ── Accounting ───────────────────────────────────────────────────────────────

export interface AccountingSnapshot {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  failedAttempts: number;
  perVenueCounts: Record<Venue | "none", number>;
  perStrategyCounts: Record<RoutingStrategy, number>;
  perSensitivityCounts: Record<SensitivityLevel, number>;
  totalCost: number;
  totalCostSaved: number;
  privacyViolations: number;
  /** 1 − violations / requests; 1 when nothing was recorded. */
  privacyComplianceRate: number;
  averageLatencyMs: number;
  averageQualityScore: number;
  averageConfidence: number;
  recentWindowHours: number;
  recentRequests: number;
  recentCost: number;
  recentCostSaved: number;
  takenAt: string;
}

/** One accounting row — metadata only, request content is never included. */
export interface AccountingEntry {
  requestId: string;
  timestamp: string;
  taskType: string;
  sensitivity: SensitivityLevel;
  strategy: RoutingStrategy;
  venueUsed: Venue | null;
  inputTokens: number;
  actualCost: number;
  baselineCost: number;
  costSaved: number;
  qualityScore: number;
  latencyMs: number;
  failedAttempts: number;
  error?: ExecutionErrorCode;
}

// ── Configuration ────────────────────────────────────────────────────────────

export interface ModelPricing {
  /** USD per 1,000 input tokens. */
  input: number;
  /** USD per 1,000 output tokens. */
  output: number;
}

export interface CapabilityEntry {
  complexity: ComplexityClass;
  baseScore: number;
}

/** Full configuration schema — loaded from tollgate.yaml */
export interface TollgateConfig {
  router: {
    privacyMode: PrivacyMode;
    costPriority: number;
    qualityThreshold: number;
    anonymizationEnabled: boolean;
    maxCloudCostPerRequest: number;
    attemptTimeoutMs: number;
    deadlineMs: number;
    maxFallbacks: number;
  };
  classifier: {
    ruleWeight: number;
    heuristicWeight: number;
    highThreshold: number;
    mediumThreshold: number;
  };
  capability: {
    /** Merged over the built-in capability table. */
    overrides: Record<string, CapabilityEntry>;
  };
  cost: {
    localCostPerCall: number;
    outputMultiplier: number;
    anonymizationOverhead: number;
    hybridRemoteShare: number;
    /** Merged over the built-in pricing table. */
    pricing: Record<string, ModelPricing>;
  };
  local: {
    baseUrl: string;
    model: string;
  };
  cloud: {
    /** Also the model the cost model prices remote venues with. */
    model: string;
    baseUrl?: string;
    apiKeyEnv: string;
  };
  accounting: {
    windowHours: number;
    persist: boolean;
    dbPath?: string;
  };
  logging: {
    level: "debug" | "info" | "warn" | "error" | "silent";
  };
}
