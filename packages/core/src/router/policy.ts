// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * PolicyDecisionMatrix — turns the three assessments into a RoutingDecision.
 *
 * Pipeline:
 *   1. Base strategy from the (sensitivity × complexity × tier) table
 *   2. HIGH sensitivity → LOCAL_ONLY / LOCAL_FORCED, no overrides
 *   3. Overrides: cost priority, then simple-and-capable → LOCAL_PREFERRED
 *   4. Admission control → substitute an inadmissible primary venue
 *   5. Fallback chain ordered by privacy, then cost
 *   6. Confidence, privacy, cost and performance figures
 */

import {
  BASE_RESPONSE_SECONDS,
  CAPABILITY_CONFIDENCE,
  COMPLEXITY_CONFIDENCE,
  CONFIDENCE_WEIGHTS,
  DECISION_TABLE,
  PRIVACY_CONFIDENCE,
  type DecisionTable,
} from "../config/tables.js";
import type {
  CapabilityAssessment,
  CapabilityTier,
  CostEstimate,
  PrivacyMode,
  RequestPreferences,
  RoutingDecision,
  RoutingStrategy,
  SensitivityLevel,
  SensitivityReport,
  Venue,
} from "../types.js";
import { VENUES } from "../types.js";
import { componentLogger } from "../utils/logger.js";
import { deepFreeze } from "../utils/security.js";

const log = componentLogger("policy");

export interface PolicyOptions {
  privacyMode: PrivacyMode;
  costPriority: number;
  anonymizationEnabled: boolean;
  maxCloudCostPerRequest: number;
  maxFallbacks: number;
  /** False when no remote backend is configured: only `local` is admissible. */
  cloudAvailable: boolean;
}

// ── Lookup tables as exhaustive switches ─────────────────────────────────────

export function venueForStrategy(strategy: RoutingStrategy): Venue {
  switch (strategy) {
    case "LOCAL_ONLY":
    case "LOCAL_FORCED":
    case "LOCAL_PREFERRED":
      return "local";
    case "CLOUD_ANONYMIZED":
      return "cloud_anonymized";
    case "CLOUD_DIRECT":
      return "cloud_direct";
    case "HYBRID":
      return "hybrid";
  }
}

export function strategyPrivacyScore(strategy: RoutingStrategy): number {
  switch (strategy) {
    case "LOCAL_ONLY":
    case "LOCAL_FORCED":
      return 1.0;
    case "LOCAL_PREFERRED":
      return 0.9;
    case "CLOUD_ANONYMIZED":
      return 0.7;
    case "HYBRID":
      return 0.6;
    case "CLOUD_DIRECT":
      return 0.3;
  }
}

export function venuePrivacyScore(venue: Venue): number {
  switch (venue) {
    case "local":
      return 1.0;
    case "cloud_anonymized":
      return 0.7;
    case "hybrid":
      return 0.6;
    case "cloud_direct":
      return 0.3;
  }
}

function strategyTimeMultiplier(strategy: RoutingStrategy): number {
  switch (strategy) {
    case "LOCAL_ONLY":
      return 0.5;
    case "LOCAL_PREFERRED":
      return 0.6;
    case "LOCAL_FORCED":
      return 0.8;
    case "CLOUD_DIRECT":
      return 2.0;
    case "CLOUD_ANONYMIZED":
      return 2.5;
    case "HYBRID":
      return 1.5;
  }
}

/** Substitutes tried, in order, when a venue is inadmissible. */
function substitutesFor(venue: Venue): Venue[] {
  switch (venue) {
    case "cloud_direct":
      return ["cloud_anonymized", "hybrid", "local"];
    case "hybrid":
      return ["cloud_anonymized", "local"];
    case "cloud_anonymized":
      return ["local"];
    case "local":
      return [];
  }
}

function isLocalStrategy(strategy: RoutingStrategy): boolean {
  return strategy === "LOCAL_ONLY" || strategy === "LOCAL_FORCED" || strategy === "LOCAL_PREFERRED";
}

function isAtLeastMedium(tier: CapabilityTier): boolean {
  return tier === "HIGH" || tier === "MEDIUM";
}

/** Most conservative strategy for a sensitivity level. */
function conservativeStrategy(level: SensitivityLevel): RoutingStrategy {
  return level === "HIGH" ? "LOCAL_FORCED" : "LOCAL_PREFERRED";
}

// ── Policy ───────────────────────────────────────────────────────────────────

export class PolicyDecisionMatrix {
  private readonly table: DecisionTable;
  private readonly options: PolicyOptions;

  constructor(options: PolicyOptions, table: DecisionTable = DECISION_TABLE) {
    this.options = options;
    this.table = table;
  }

  /** Pure and synchronous. A HIGH report never yields a non-local venue. */
  decide(
    requestId: string,
    report: SensitivityReport,
    capability: CapabilityAssessment,
    cost: CostEstimate,
    preferences: Readonly<RequestPreferences> = {},
  ): RoutingDecision {
    const reasons: string[] = [
      `sensitivity=${report.level} (score ${report.finalScore.toFixed(2)})`,
      `complexity=${capability.complexity}`,
      `capability=${capability.tier} (${capability.score.toFixed(2)})`,
    ];

    // ── Step 1: Base strategy ────────────────────────────────────────────────
    let strategy = this.baseStrategy(report.level, capability, reasons);

    // ── Step 2/3: Privacy precedence, then overrides ─────────────────────────
    if (report.level === "HIGH") {
      if (strategy !== "LOCAL_ONLY" && strategy !== "LOCAL_FORCED") {
        reasons.push(`high sensitivity: ${strategy} replaced by LOCAL_FORCED`);
        strategy = "LOCAL_FORCED";
      }
    } else {
      strategy = this.applyOverrides(strategy, capability, preferences, reasons);
    }

    // ── Step 4: Admission control ────────────────────────────────────────────
    const admissible = this.admissibleVenues(report, cost);
    let primaryVenue = venueForStrategy(strategy);
    if (!admissible.includes(primaryVenue)) {
      const substitute = substitutesFor(primaryVenue).find((v) => admissible.includes(v)) ?? "local";
      reasons.push(`venue ${primaryVenue} not admissible, substituted ${substitute}`);
      primaryVenue = substitute;
      strategy = this.strategyForVenue(substitute, capability.tier);
    }

    // ── Step 5: Fallback chain ───────────────────────────────────────────────
    const fallbackChain =
      strategy === "LOCAL_ONLY" || strategy === "LOCAL_FORCED"
        ? []
        : admissible
            .filter((v) => v !== primaryVenue)
            .sort(
              (a, b) =>
                venuePrivacyScore(b) - venuePrivacyScore(a) ||
                cost.venues[a].totalCost - cost.venues[b].totalCost,
            )
            .slice(0, this.options.maxFallbacks);
    reasons.push(`strategy=${strategy}`, `fallbacks=[${fallbackChain.join(", ")}]`);

    // ── Step 6: Scores ───────────────────────────────────────────────────────
    const confidence =
      PRIVACY_CONFIDENCE[report.level] * CONFIDENCE_WEIGHTS.privacy +
      CAPABILITY_CONFIDENCE[capability.tier] * CONFIDENCE_WEIGHTS.capability +
      COMPLEXITY_CONFIDENCE[capability.complexity] * CONFIDENCE_WEIGHTS.complexity;
    const costImpact = cost.venues[primaryVenue].totalCost;
    const responseSeconds = BASE_RESPONSE_SECONDS[capability.complexity] * strategyTimeMultiplier(strategy);

    log.debug({ requestId, strategy, primaryVenue, fallbackChain }, "decided");

    // Assessments are copied so freezing leaves the caller's objects alone
    return deepFreeze<RoutingDecision>({
      requestId,
      strategy,
      primaryVenue,
      fallbackChain,
      confidence,
      privacyScore: strategyPrivacyScore(strategy),
      costImpact,
      estimatedSavings: cost.baselineCost - costImpact,
      performanceEstimate: Math.max(0.1, 1 / (1 + responseSeconds / 5)),
      reasoning: reasons.join("; "),
      sensitivity: structuredClone(report),
      capability: structuredClone(capability),
      costEstimate: structuredClone(cost),
    });
  }

  /** Venues the request may use under the configured privacy mode and limits. */
  admissibleVenues(report: SensitivityReport, cost: CostEstimate): Venue[] {
    return VENUES.filter((venue) => {
      if (venue === "local") return true;
      if (!this.privacyAllows(report, venue)) return false;
      if (venue === "cloud_anonymized" && !this.options.anonymizationEnabled) return false;
      if (!this.options.cloudAvailable) return false;
      return cost.venues[venue].totalCost <= this.options.maxCloudCostPerRequest;
    });
  }

  private privacyAllows(report: SensitivityReport, venue: Venue): boolean {
    const rawRemote = venue === "cloud_direct" || venue === "hybrid";
    switch (report.level) {
      case "HIGH":
        return venue === "local";
      case "MEDIUM":
        return this.options.privacyMode === "permissive" || !rawRemote;
      case "LOW":
        return !(this.options.privacyMode === "strict" && rawRemote && report.matchedCategories.length > 0);
    }
  }

  private baseStrategy(level: SensitivityLevel, capability: CapabilityAssessment, reasons: string[]): RoutingStrategy {
    const mapped = this.table[level]?.[capability.complexity]?.[capability.tier];
    if (mapped) {
      reasons.push(`base=${mapped}`);
      return mapped;
    }
    const fallback = conservativeStrategy(level);
    log.warn(
      { level, complexity: capability.complexity, tier: capability.tier },
      "unmapped decision tuple, using conservative strategy",
    );
    reasons.push(`base=${fallback} (unmapped tuple)`);
    return fallback;
  }

  private applyOverrides(
    base: RoutingStrategy,
    capability: CapabilityAssessment,
    preferences: Readonly<RequestPreferences>,
    reasons: string[],
  ): RoutingStrategy {
    let strategy = base;
    const costPriority = preferences.costPriority ?? this.options.costPriority;

    if (
      costPriority > 0.7 &&
      (strategy === "CLOUD_DIRECT" || strategy === "CLOUD_ANONYMIZED") &&
      isAtLeastMedium(capability.tier)
    ) {
      reasons.push(`cost priority ${costPriority.toFixed(2)} → LOCAL_PREFERRED`);
      strategy = "LOCAL_PREFERRED";
    }

    if (capability.complexity === "SIMPLE" && capability.tier === "HIGH" && !isLocalStrategy(strategy)) {
      reasons.push("simple task with high local capability → LOCAL_PREFERRED");
      strategy = "LOCAL_PREFERRED";
    }

    return strategy;
  }

  private strategyForVenue(venue: Venue, tier: CapabilityTier): RoutingStrategy {
    switch (venue) {
      case "local":
        return isAtLeastMedium(tier) ? "LOCAL_PREFERRED" : "LOCAL_FORCED";
      case "cloud_anonymized":
        return "CLOUD_ANONYMIZED";
      case "cloud_direct":
        return "CLOUD_DIRECT";
      case "hybrid":
        return "HYBRID";
    }
  }
}
