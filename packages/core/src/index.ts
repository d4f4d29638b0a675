// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Tollgate public API.
 * Import from this module when using Tollgate as a library.
 */

export { VERSION } from "./version.js";
export type * from "./types.js";
export { VENUES } from "./types.js";
export {
  TollgateError,
  ConfigurationError,
  InvalidRequestError,
  RoutingError,
  ClassificationError,
  EstimationError,
  CostDataMissingError,
  ExecutionBackendError,
  ExecutionTimeoutError,
  ExecutionCancelledError,
} from "./exceptions.js";
export { loadConfig, parseConfig, defaultConfig } from "./config/config.js";
export {
  CAPABILITY_TABLE,
  DECISION_TABLE,
  PRICING_TABLE,
  FALLBACK_PRICING,
  DEFAULT_CAPABILITY,
} from "./config/tables.js";
export type { DecisionTable } from "./config/tables.js";
export * from "./router/index.js";
export * from "./backends/index.js";
export { SqliteAccountingSink, DEFAULT_DB_PATH } from "./persistence/sqliteSink.js";
export type { DailySummary } from "./persistence/sqliteSink.js";
export { formatAccountingReport, formatDailySummary, formatDecision } from "./dashboard/report.js";
export { logger, componentLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export { maskKey, envVar, requireEnvVar } from "./utils/security.js";
export { createRouterFromConfig } from "./factory.js";
export type { ConfiguredRouter } from "./factory.js";
