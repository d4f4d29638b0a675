// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * CapabilityEstimator — how well can the local model handle this task?
 *
 * score = baseScore(taskType) × multiplier(complexity), clamped to [0, 1]
 * tier  = HIGH ≥ 0.8 > MEDIUM ≥ 0.6 > LOW
 *
 * Complexity is the more severe of the table class for the task type and the
 * class inferred from the content (keyword hints, then line/function counts).
 */

import { BASE_LATENCY_SECONDS, CAPABILITY_TABLE, DEFAULT_CAPABILITY } from "../config/tables.js";
import { EstimationError } from "../exceptions.js";
import type { CapabilityAssessment, CapabilityEntry, CapabilityTier, ComplexityClass } from "../types.js";
import { componentLogger } from "../utils/logger.js";

const log = componentLogger("capability");

const COMPLEXITY_ORDER: readonly ComplexityClass[] = ["SIMPLE", "MEDIUM", "COMPLEX", "ULTRA_COMPLEX"];

interface ComplexityHint {
  complexity: ComplexityClass;
  keywords: string[];
  maxLines: number;
  maxFunctions: number;
}

const COMPLEXITY_HINTS: readonly ComplexityHint[] = [
  {
    complexity: "SIMPLE",
    keywords: ["syntax", "format", "lint", "style", "rename", "comment"],
    maxLines: 50,
    maxFunctions: 3,
  },
  {
    complexity: "MEDIUM",
    keywords: ["refactor", "optimize", "debug", "test", "implement"],
    maxLines: 200,
    maxFunctions: 10,
  },
  {
    complexity: "COMPLEX",
    keywords: ["design", "architecture", "algorithm", "pattern", "framework"],
    maxLines: 500,
    maxFunctions: 25,
  },
  {
    complexity: "ULTRA_COMPLEX",
    keywords: ["system", "distributed", "microservice", "scalable", "enterprise"],
    maxLines: Infinity,
    maxFunctions: Infinity,
  },
];

const FUNCTION_DEF = /\b(?:def|function|func|fn)\s+\w+/g;

export function complexityMultiplier(complexity: ComplexityClass): number {
  switch (complexity) {
    case "SIMPLE":
      return 1.2;
    case "MEDIUM":
      return 1.0;
    case "COMPLEX":
      return 0.7;
    case "ULTRA_COMPLEX":
      return 0.4;
  }
}

export function scoreTier(score: number): CapabilityTier {
  if (score >= 0.8) return "HIGH";
  if (score >= 0.6) return "MEDIUM";
  return "LOW";
}

/** Infer a complexity class from the content alone. */
export function inferComplexity(content: string): ComplexityClass {
  const lower = content.toLowerCase();
  const lines = content.split("\n").length;
  const functions = (content.match(FUNCTION_DEF) ?? []).length;

  for (const hint of COMPLEXITY_HINTS) {
    if (
      hint.keywords.some((k) => lower.includes(k)) &&
      lines <= hint.maxLines &&
      functions <= hint.maxFunctions
    ) {
      return hint.complexity;
    }
  }

  for (const hint of COMPLEXITY_HINTS) {
    if (lines <= hint.maxLines && functions <= hint.maxFunctions) return hint.complexity;
  }
  return "ULTRA_COMPLEX";
}

function moreSevere(a: ComplexityClass, b: ComplexityClass): ComplexityClass {
  return COMPLEXITY_ORDER.indexOf(a) >= COMPLEXITY_ORDER.indexOf(b) ? a : b;
}

export class CapabilityEstimator {
  private readonly table: Readonly<Record<string, CapabilityEntry>>;

  constructor(table: Readonly<Record<string, CapabilityEntry>> = CAPABILITY_TABLE) {
    this.table = table;
  }

  /** Pure; unknown task types fall back to MEDIUM / 0.5 with usedDefaults set. */
  estimate(taskType: string, content: string): CapabilityAssessment {
    let entry: CapabilityEntry;
    let usedDefaults = false;
    try {
      entry = this.lookup(taskType);
    } catch (err) {
      if (!(err instanceof EstimationError)) throw err;
      log.warn({ taskType }, "unknown task type, using default capability");
      entry = DEFAULT_CAPABILITY;
      usedDefaults = true;
    }

    const inferredComplexity = inferComplexity(content);
    const complexity = moreSevere(entry.complexity, inferredComplexity);
    const score = Math.min(Math.max(entry.baseScore * complexityMultiplier(complexity), 0), 1);

    return {
      taskType,
      complexity,
      tableComplexity: entry.complexity,
      inferredComplexity,
      baseScore: entry.baseScore,
      score,
      tier: scoreTier(score),
      estimatedLatencyMs: Math.round(BASE_LATENCY_SECONDS[complexity] * (2 - score) * 1000),
      usedDefaults,
    };
  }

  private lookup(taskType: string): CapabilityEntry {
    const entry = Object.hasOwn(this.table, taskType) ? this.table[taskType] : undefined;
    if (!entry) throw new EstimationError(taskType);
    return entry;
  }
}
