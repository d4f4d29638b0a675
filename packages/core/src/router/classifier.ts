// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * SensitivityClassifier — grades request content HIGH / MEDIUM / LOW.
 *
 * Two signals:
 *   1. compositeScore  — Σ matchCount × category severity over the pattern catalogue
 *   2. heuristicScore  — pluggable SensitivityScorer (0–10), keyword density by default
 *
 *   finalScore = composite × ruleWeight + heuristic × heuristicWeight
 *
 * Any critical_secrets match forces HIGH. A scorer fault fails closed to HIGH.
 *
 * PRIVACY NOTE: reports carry pattern ids and counts only. Matched values are
 * never stored, returned or logged.
 */

import { ClassificationError } from "../exceptions.js";
import type {
  CategoryMatch,
  SensitivityCategory,
  SensitivityLevel,
  SensitivityReport,
  TollgateConfig,
} from "../types.js";
import { componentLogger } from "../utils/logger.js";

const log = componentLogger("classifier");

// ── Heuristic scorer ─────────────────────────────────────────────────────────

/** Secondary signal blended into the final score. Must return a number in [0, 10]. */
export interface SensitivityScorer {
  score(content: string): number;
}

const SENSITIVE_WORDS = ["secret", "private", "confidential", "password", "key", "token"];

/** Presence count of sensitive words per 100 characters, scaled to 0–10. */
export class KeywordDensityScorer implements SensitivityScorer {
  score(content: string): number {
    const lower = content.toLowerCase();
    const count = SENSITIVE_WORDS.filter((w) => lower.includes(w)).length;
    const density = count / Math.max(content.length / 100, 1);
    return Math.min(density * 5, 10);
  }
}

// ── Pattern catalogue ────────────────────────────────────────────────────────

interface SensitivityPattern {
  id: string;
  regex: RegExp;
  /** Extra check on each raw match (checksums). */
  validate?: (match: string) => boolean;
}

interface CategoryDefinition {
  category: SensitivityCategory;
  severity: number;
  patterns: SensitivityPattern[];
}

// Luhn check for card numbers
function isValidLuhn(raw: string): boolean {
  const digits = raw.replace(/[ -]/g, "");
  if (digits.length < 13 || digits.length > 19) return false;
  let sum = 0;
  let alt = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let n = Number(digits[i]);
    if (alt) {
      n *= 2;
      if (n > 9) n -= 9;
    }
    sum += n;
    alt = !alt;
  }
  return sum % 10 === 0;
}

// ISO 13616 mod-97 check for IBANs
function isValidIban(raw: string): boolean {
  const iban = raw.replace(/\s/g, "").toUpperCase();
  const rearranged = iban.slice(4) + iban.slice(0, 4);
  let remainder = 0;
  for (const ch of rearranged) {
    const code = ch >= "A" && ch <= "Z" ? String(ch.charCodeAt(0) - 55) : ch;
    for (const d of code) {
      remainder = (remainder * 10 + Number(d)) % 97;
    }
  }
  return remainder === 1;
}

/** Ordered by severity. Exported for diagnostics and tests. */
export const SENSITIVITY_CATEGORIES: readonly CategoryDefinition[] = [
  {
    category: "critical_secrets",
    severity: 10,
    patterns: [
      { id: "credential_name", regex: /\b(?:api[_-]?key|secret[_-]?key|access[_-]?token)\b/gi },
      { id: "password_assignment", regex: /\b(?:password|passwd|pwd)\s*[=:]\s*["']?[\w@#$%^&*]+/gi },
      { id: "private_key_block", regex: /-----BEGIN (?:[A-Z]+ )?PRIVATE KEY-----/g },
      { id: "secret_key_token", regex: /\bsk-[A-Za-z0-9_-]{8,}/g },
      { id: "bearer_token", regex: /\bbearer\s+[A-Za-z0-9._~+/-]{8,}=*/gi },
      {
        id: "credentialed_connection_string",
        regex: /\b[a-z][a-z0-9+.-]*:\/\/[^\s:/@]+:[^\s@/]+@[^\s/]+/gi,
      },
    ],
  },
  {
    category: "personal_data",
    severity: 8,
    patterns: [
      { id: "email", regex: /\b[\w.+%-]+@[\w-]+(?:\.[\w-]+)*\.[a-z]{2,}\b/gi },
      { id: "phone", regex: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g },
      { id: "ssn", regex: /\b\d{3}-\d{2}-\d{4}\b/g },
      { id: "card_number", regex: /\b(?:\d[ -]?){12,18}\d\b/g, validate: isValidLuhn },
      { id: "iban", regex: /\b[A-Z]{2}\d{2}[A-Z0-9]{11,30}\b/g, validate: isValidIban },
    ],
  },
  {
    category: "infrastructure",
    severity: 6,
    patterns: [
      { id: "ipv4_address", regex: /\b(?:(?:25[0-5]|2[0-4]\d|1?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|1?\d?\d)\b/g },
      { id: "database_url", regex: /\b(?:mongodb|mysql|postgres(?:ql)?|redis):\/\/\S+/gi },
      { id: "internal_host", regex: /\b[\w-]+\.(?:internal|local|corp|lan)\b/gi },
    ],
  },
  {
    category: "business_secrets",
    severity: 4,
    patterns: [
      { id: "confidentiality_marker", regex: /\b(?:proprietary|confidential|trade secret|internal only|classified)\b/gi },
      { id: "financial_terms", regex: /\b(?:revenue|profit|pricing|financial)\b/gi },
    ],
  },
];

// ── Recommendations ──────────────────────────────────────────────────────────

const LEVEL_RECOMMENDATIONS: Record<SensitivityLevel, string[]> = {
  HIGH: [
    "Process on the local model only",
    "Do not send this content to any remote service",
  ],
  MEDIUM: ["Anonymize identifiers before remote processing", "Prefer local processing"],
  LOW: ["Remote processing is acceptable"],
};

const CATEGORY_RECOMMENDATIONS: Record<SensitivityCategory, string> = {
  critical_secrets: "Remove or rotate the embedded credentials",
  personal_data: "Mask personal data before sharing",
  infrastructure: "Replace internal addresses and hostnames with placeholders",
  business_secrets: "Review confidentiality markings before sharing",
};

// ── Classifier ───────────────────────────────────────────────────────────────

export class SensitivityClassifier {
  private readonly scorer: SensitivityScorer;
  private readonly weights: TollgateConfig["classifier"];

  constructor(weights: TollgateConfig["classifier"], scorer: SensitivityScorer = new KeywordDensityScorer()) {
    this.weights = weights;
    this.scorer = scorer;
  }

  /** Deterministic for a fixed scorer. Never throws: internal faults fail closed to HIGH. */
  classify(content: string): SensitivityReport {
    try {
      return this.grade(content);
    } catch (err) {
      log.error({ err: err instanceof Error ? err.message : String(err) }, "classifier fault, failing closed");
      return {
        level: "HIGH",
        compositeScore: 0,
        heuristicScore: 0,
        finalScore: 0,
        matchedCategories: [],
        recommendations: this.recommend("HIGH", []),
        failedClosed: true,
      };
    }
  }

  private grade(content: string): SensitivityReport {
    const { matchedCategories, compositeScore } = this.scanPatterns(content);
    const heuristicScore = this.runScorer(content);
    const finalScore =
      compositeScore * this.weights.ruleWeight + heuristicScore * this.weights.heuristicWeight;
    const level = this.levelFor(finalScore, matchedCategories);

    log.debug(
      { level, compositeScore, heuristicScore, patterns: matchedCategories.map((m) => m.patternId) },
      "classified",
    );

    return {
      level,
      compositeScore,
      heuristicScore,
      finalScore,
      matchedCategories,
      recommendations: this.recommend(level, matchedCategories),
      failedClosed: false,
    };
  }

  private scanPatterns(content: string): { matchedCategories: CategoryMatch[]; compositeScore: number } {
    const matchedCategories: CategoryMatch[] = [];
    let compositeScore = 0;
    for (const { category, severity, patterns } of SENSITIVITY_CATEGORIES) {
      for (const { id, regex, validate } of patterns) {
        const found = content.match(new RegExp(regex.source, regex.flags)) ?? [];
        const matchCount = validate ? found.filter(validate).length : found.length;
        if (matchCount > 0) {
          matchedCategories.push({ category, patternId: id, matchCount });
          compositeScore += matchCount * severity;
        }
      }
    }
    return { matchedCategories, compositeScore };
  }

  private runScorer(content: string): number {
    const value = this.scorer.score(content);
    if (!Number.isFinite(value)) {
      throw new ClassificationError(`Heuristic scorer returned a non-finite value: ${value}`);
    }
    return Math.min(Math.max(value, 0), 10);
  }

  private levelFor(finalScore: number, matches: CategoryMatch[]): SensitivityLevel {
    if (finalScore >= this.weights.highThreshold || matches.some((m) => m.category === "critical_secrets")) {
      return "HIGH";
    }
    if (finalScore >= this.weights.mediumThreshold) return "MEDIUM";
    return "LOW";
  }

  private recommend(level: SensitivityLevel, matches: CategoryMatch[]): string[] {
    const categories = new Set(matches.map((m) => m.category));
    return [...LEVEL_RECOMMENDATIONS[level], ...[...categories].map((c) => CATEGORY_RECOMMENDATIONS[c])];
  }
}
