// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Anonymizer — reversible identifier/string-literal masking for the
 * anonymized remote path.
 *
 * Placeholders carry a per-invocation nonce (`anon_<nonce>_id<n>`,
 * `anon_<nonce>_str<n>`) so mappings from concurrent requests never collide.
 * A mapping belongs to exactly one request and is dropped after restore.
 */

import { randomUUID } from "crypto";

export interface AnonymizationMapping {
  readonly requestId: string;
  readonly nonce: string;
  /** placeholder → original */
  readonly entries: ReadonlyMap<string, string>;
}

export interface AnonymizedText {
  text: string;
  mapping: AnonymizationMapping;
}

export interface RestoredText {
  text: string;
  /** Placeholder-shaped tokens with no mapping entry, left verbatim. */
  unresolved: string[];
}

const KEYWORDS = new Set([
  "and", "as", "async", "await", "break", "case", "catch", "class", "const", "def",
  "else", "except", "export", "false", "for", "from", "function", "if", "import", "in",
  "let", "new", "none", "not", "null", "or", "pass", "print", "return", "self",
  "this", "true", "try", "var", "while", "with",
]);

// String literal (single, double or backtick quoted) or identifier
const TOKEN = /(["'`])((?:\\.|(?!\1)[^\\\n])*)\1|\b[A-Za-z_][A-Za-z0-9_]*\b/g;

const PLACEHOLDER = /\banon_[0-9a-f]{8}_(?:id|str)\d+\b/g;

export class Anonymizer {
  anonymize(text: string, requestId: string): AnonymizedText {
    const nonce = randomUUID().replace(/-/g, "").slice(0, 8);
    const byOriginal = new Map<string, string>();
    const entries = new Map<string, string>();
    let ids = 0;
    let strs = 0;

    const placeholderFor = (original: string, kind: "id" | "str"): string => {
      const key = `${kind}:${original}`;
      const existing = byOriginal.get(key);
      if (existing) return existing;
      const placeholder = kind === "id" ? `anon_${nonce}_id${++ids}` : `anon_${nonce}_str${++strs}`;
      byOriginal.set(key, placeholder);
      entries.set(placeholder, original);
      return placeholder;
    };

    const masked = text.replace(TOKEN, (match: string, quote: string | undefined, body: string | undefined) => {
      if (quote !== undefined && body !== undefined) {
        return body.length > 3 ? `${quote}${placeholderFor(body, "str")}${quote}` : match;
      }
      if (match.length <= 2 || KEYWORDS.has(match.toLowerCase())) return match;
      return placeholderFor(match, "id");
    });

    return { text: masked, mapping: { requestId, nonce, entries } };
  }

  /** Longest placeholder first, so `_id1` never clobbers `_id12`. Never throws. */
  restore(text: string, mapping: AnonymizationMapping): RestoredText {
    const keys = [...mapping.entries.keys()].sort((a, b) => b.length - a.length);
    let restored = text;
    for (const key of keys) {
      const original = mapping.entries.get(key);
      if (original !== undefined) restored = restored.split(key).join(original);
    }

    // Only tokens that were placeholder-shaped before restore count as unresolved
    const unresolved = [...new Set(text.match(PLACEHOLDER) ?? [])].filter((p) => !mapping.entries.has(p));
    return { text: restored, unresolved };
  }
}
