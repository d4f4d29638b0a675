// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Configuration loader for Tollgate.
 * Reads tollgate.yaml from the project directory or ~/.tollgate/config.yaml.
 * Validates with Zod and provides typed defaults.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigurationError } from "../exceptions.js";
import type { TollgateConfig } from "../types.js";
import { applyLogLevel } from "../utils/logger.js";

// ── Zod schema ───────────────────────────────────────────────────────────────

const unit = z.number().min(0).max(1);

const RouterSchema = z.object({
  privacyMode: z.enum(["strict", "balanced", "permissive"]).default("balanced"),
  costPriority: unit.default(0.5),
  qualityThreshold: unit.default(0.7),
  anonymizationEnabled: z.boolean().default(true),
  maxCloudCostPerRequest: z.number().nonnegative().default(0.5),
  attemptTimeoutMs: z.number().int().positive().default(30_000),
  deadlineMs: z.number().int().positive().default(90_000),
  maxFallbacks: z.number().int().min(0).max(2).default(2),
});

const ClassifierSchema = z
  .object({
    ruleWeight: unit.default(0.7),
    heuristicWeight: unit.default(0.3),
    highThreshold: z.number().positive().default(8),
    mediumThreshold: z.number().positive().default(3),
  })
  .refine((c) => c.mediumThreshold <= c.highThreshold, {
    message: "medium_threshold must not exceed high_threshold",
    path: ["mediumThreshold"],
  });

const CapabilityEntrySchema = z.object({
  complexity: z.enum(["SIMPLE", "MEDIUM", "COMPLEX", "ULTRA_COMPLEX"]),
  baseScore: unit,
});

const CapabilitySchema = z.object({
  overrides: z.record(CapabilityEntrySchema).default({}),
});

const PricingSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
});

const CostSchema = z.object({
  localCostPerCall: z.number().nonnegative().default(0.00005),
  outputMultiplier: z.number().min(1.5).max(2).default(1.5),
  anonymizationOverhead: z.number().nonnegative().default(0.1),
  hybridRemoteShare: unit.default(0.5),
  pricing: z.record(PricingSchema).default({}),
});

const LocalSchema = z.object({
  baseUrl: z.string().url().default("http://localhost:11434"),
  model: z.string().default("mistral:7b"),
});

const CloudSchema = z.object({
  model: z.string().default("gpt-4o"),
  baseUrl: z.string().url().optional(),
  apiKeyEnv: z.string().default("OPENAI_API_KEY"),
});

const AccountingSchema = z.object({
  windowHours: z.number().positive().default(24),
  persist: z.boolean().default(false),
  dbPath: z.string().optional(),
});

const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

const ConfigSchema = z.object({
  router: RouterSchema.default({}),
  classifier: ClassifierSchema.default({}),
  capability: CapabilitySchema.default({}),
  cost: CostSchema.default({}),
  local: LocalSchema.default({}),
  cloud: CloudSchema.default({}),
  accounting: AccountingSchema.default({}),
  logging: LoggingSchema.default({}),
});

// ── YAML key → camelCase mapping ─────────────────────────────────────────────

/**
 * Convert snake_case YAML keys to camelCase for the Zod schema.
 * Keys under capability.overrides and cost.pricing are task types and model
 * names, so they are kept as written.
 */
function toCamel(obj: unknown, preserveKeys = false): unknown {
  if (Array.isArray(obj)) return obj.map((v) => toCamel(v));
  if (obj !== null && typeof obj === "object") {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => {
        const key = preserveKeys ? k : k.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
        return [key, toCamel(v, key === "overrides" || key === "pricing")];
      }),
    );
  }
  return obj;
}

// ── Loader ───────────────────────────────────────────────────────────────────

const SEARCH_PATHS = [
  "tollgate.yaml",
  "config/tollgate.yaml",
  join(homedir(), ".tollgate", "config.yaml"),
];

/** Validate an already-parsed config object (snake_case or camelCase keys). */
export function parseConfig(raw: unknown, source = "<inline>"): TollgateConfig {
  const result = ConfigSchema.safeParse(toCamel(raw ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ConfigurationError(`Invalid configuration in '${source}':\n${issues}`);
  }
  return result.data;
}

export function loadConfig(configPath?: string): TollgateConfig {
  const paths = configPath ? [configPath] : SEARCH_PATHS;
  const found = paths.find((p) => existsSync(p));

  if (!found) {
    if (configPath) {
      throw new ConfigurationError(`Config file not found: '${configPath}'`);
    }
    // No config file — all defaults (local backend only)
    return ConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to read config at '${found}': ${String(err)}`);
  }

  const config = parseConfig(raw, found);
  applyLogLevel(config.logging.level);
  return config;
}

export const defaultConfig: TollgateConfig = ConfigSchema.parse({});
