// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export { SensitivityClassifier, KeywordDensityScorer, SENSITIVITY_CATEGORIES } from "./classifier.js";
export type { SensitivityScorer } from "./classifier.js";
export { CapabilityEstimator, inferComplexity, scoreTier, complexityMultiplier } from "./capability.js";
export { CostModel, estimateTokens, priceTokens } from "./costModel.js";
export { Anonymizer } from "./anonymizer.js";
export type { AnonymizationMapping, AnonymizedText, RestoredText } from "./anonymizer.js";
export { PolicyDecisionMatrix, venueForStrategy, strategyPrivacyScore, venuePrivacyScore } from "./policy.js";
export type { PolicyOptions } from "./policy.js";
export { Executor, runWithAbort, splitForHybrid } from "./executor.js";
export type { ExecutorOptions, ExecuteOptions } from "./executor.js";
export { AccountingMonitor, permittedVenues } from "./accounting.js";
export type { AccountingOptions, PersistenceSink } from "./accounting.js";
export { PrivacyRouter, createRequest } from "./router.js";
export type { PrivacyRouterDeps, RequestInput, RouteOptions } from "./router.js";
