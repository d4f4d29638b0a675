// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Built-in routing tables. Every table is frozen at module load; the router
 * takes them as injected values so tests and deployments can substitute their own.
 */

import type {
  CapabilityEntry,
  CapabilityTier,
  ComplexityClass,
  ModelPricing,
  RoutingStrategy,
  SensitivityLevel,
} from "../types.js";
import { deepFreeze } from "../utils/security.js";

// ── Capability ───────────────────────────────────────────────────────────────

/** Expected local-model quality per task type. */
export const CAPABILITY_TABLE: Readonly<Record<string, CapabilityEntry>> = deepFreeze<Record<string, CapabilityEntry>>({
  code_completion: { complexity: "SIMPLE", baseScore: 0.85 },
  syntax_checking: { complexity: "SIMPLE", baseScore: 0.95 },
  code_formatting: { complexity: "SIMPLE", baseScore: 0.9 },
  variable_naming: { complexity: "SIMPLE", baseScore: 0.9 },
  comment_generation: { complexity: "SIMPLE", baseScore: 0.75 },
  simple_refactoring: { complexity: "SIMPLE", baseScore: 0.8 },
  bug_detection: { complexity: "MEDIUM", baseScore: 0.7 },
  test_generation: { complexity: "MEDIUM", baseScore: 0.65 },
  code_explanation: { complexity: "MEDIUM", baseScore: 0.65 },
  optimization: { complexity: "MEDIUM", baseScore: 0.6 },
  complex_generation: { complexity: "COMPLEX", baseScore: 0.4 },
  complex_algorithm: { complexity: "COMPLEX", baseScore: 0.35 },
  architecture_design: { complexity: "COMPLEX", baseScore: 0.3 },
  security_audit: { complexity: "COMPLEX", baseScore: 0.25 },
  performance_analysis: { complexity: "COMPLEX", baseScore: 0.35 },
  system_design: { complexity: "ULTRA_COMPLEX", baseScore: 0.2 },
});

export const DEFAULT_CAPABILITY: CapabilityEntry = deepFreeze<CapabilityEntry>({ complexity: "MEDIUM", baseScore: 0.5 });

// ── Decision matrix ──────────────────────────────────────────────────────────

/** Sensitivity × complexity × tier → base strategy. Injected tables may leave tuples unmapped. */
export type DecisionTable = Readonly<
  Partial<Record<SensitivityLevel, Partial<Record<ComplexityClass, Partial<Record<CapabilityTier, RoutingStrategy>>>>>>
>;

export const DECISION_TABLE: DecisionTable = deepFreeze<DecisionTable>({
  HIGH: {
    SIMPLE: { HIGH: "LOCAL_ONLY", MEDIUM: "LOCAL_ONLY", LOW: "LOCAL_FORCED" },
    MEDIUM: { HIGH: "LOCAL_ONLY", MEDIUM: "LOCAL_FORCED", LOW: "LOCAL_FORCED" },
    COMPLEX: { HIGH: "LOCAL_ONLY", MEDIUM: "LOCAL_FORCED", LOW: "LOCAL_FORCED" },
    ULTRA_COMPLEX: { HIGH: "LOCAL_FORCED", MEDIUM: "LOCAL_FORCED", LOW: "LOCAL_FORCED" },
  },
  MEDIUM: {
    SIMPLE: { HIGH: "LOCAL_PREFERRED", MEDIUM: "LOCAL_PREFERRED", LOW: "CLOUD_ANONYMIZED" },
    MEDIUM: { HIGH: "LOCAL_PREFERRED", MEDIUM: "CLOUD_ANONYMIZED", LOW: "CLOUD_ANONYMIZED" },
    COMPLEX: { HIGH: "LOCAL_PREFERRED", MEDIUM: "CLOUD_ANONYMIZED", LOW: "CLOUD_ANONYMIZED" },
    ULTRA_COMPLEX: { HIGH: "CLOUD_ANONYMIZED", MEDIUM: "CLOUD_ANONYMIZED", LOW: "CLOUD_ANONYMIZED" },
  },
  LOW: {
    SIMPLE: { HIGH: "LOCAL_PREFERRED", MEDIUM: "LOCAL_PREFERRED", LOW: "CLOUD_DIRECT" },
    MEDIUM: { HIGH: "LOCAL_PREFERRED", MEDIUM: "CLOUD_DIRECT", LOW: "CLOUD_DIRECT" },
    COMPLEX: { HIGH: "HYBRID", MEDIUM: "CLOUD_DIRECT", LOW: "CLOUD_DIRECT" },
    ULTRA_COMPLEX: { HIGH: "HYBRID", MEDIUM: "CLOUD_DIRECT", LOW: "CLOUD_DIRECT" },
  },
});

// ── Pricing (USD per 1K tokens) ──────────────────────────────────────────────

export const PRICING_TABLE: Readonly<Record<string, ModelPricing>> = deepFreeze<Record<string, ModelPricing>>({
  "gpt-4": { input: 0.03, output: 0.06 },
  "gpt-4o": { input: 0.0025, output: 0.01 },
  "gpt-4o-mini": { input: 0.00015, output: 0.0006 },
  "gpt-3.5-turbo": { input: 0.0015, output: 0.002 },
  "claude-3-sonnet": { input: 0.003, output: 0.015 },
  "claude-3-haiku": { input: 0.00025, output: 0.00125 },
});

/** Used when the configured cloud model has no pricing entry. */
export const FALLBACK_PRICING: ModelPricing = deepFreeze<ModelPricing>({ input: 0.03, output: 0.06 });

// ── Decision scoring ─────────────────────────────────────────────────────────

export const PRIVACY_CONFIDENCE: Readonly<Record<SensitivityLevel, number>> = deepFreeze({
  HIGH: 0.9,
  MEDIUM: 0.7,
  LOW: 0.8,
});

export const CAPABILITY_CONFIDENCE: Readonly<Record<CapabilityTier, number>> = deepFreeze({
  HIGH: 0.9,
  MEDIUM: 0.7,
  LOW: 0.5,
});

export const COMPLEXITY_CONFIDENCE: Readonly<Record<ComplexityClass, number>> = deepFreeze({
  SIMPLE: 0.9,
  MEDIUM: 0.7,
  COMPLEX: 0.6,
  ULTRA_COMPLEX: 0.4,
});

export const CONFIDENCE_WEIGHTS = deepFreeze({ privacy: 0.4, capability: 0.4, complexity: 0.2 });

/** Base execution time (seconds) before the strategy multiplier. */
export const BASE_RESPONSE_SECONDS: Readonly<Record<ComplexityClass, number>> = deepFreeze({
  SIMPLE: 1,
  MEDIUM: 3,
  COMPLEX: 10,
  ULTRA_COMPLEX: 20,
});

/** Base local latency (seconds) used by the capability estimator. */
export const BASE_LATENCY_SECONDS: Readonly<Record<ComplexityClass, number>> = deepFreeze({
  SIMPLE: 2,
  MEDIUM: 5,
  COMPLEX: 15,
  ULTRA_COMPLEX: 30,
});
