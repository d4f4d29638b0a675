// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";
import { Anonymizer, type AnonymizationMapping } from "../../src/router/anonymizer.js";

const anonymizer = new Anonymizer();

describe("Anonymizer", () => {
  describe("anonymize", () => {
    it("masks identifiers and string literals with nonce-tagged placeholders", () => {
      const { text, mapping } = anonymizer.anonymize("const userName = 'alice smith';", "req-1");
      const n = mapping.nonce;
      expect(n).toMatch(/^[0-9a-f]{8}$/);
      expect(mapping.requestId).toBe("req-1");
      expect(text).toBe(`const anon_${n}_id1 = 'anon_${n}_str1';`);
      expect(mapping.entries.get(`anon_${n}_id1`)).toBe("userName");
      expect(mapping.entries.get(`anon_${n}_str1`)).toBe("alice smith");
    });

    it("reuses the placeholder for a repeated original", () => {
      const { text, mapping } = anonymizer.anonymize("def compute(values): return sum(values)", "req-2");
      const n = mapping.nonce;
      expect(text).toBe(`def anon_${n}_id1(anon_${n}_id2): return anon_${n}_id3(anon_${n}_id2)`);
      expect(mapping.entries.size).toBe(3);
    });

    it("keeps keywords, short identifiers and short strings", () => {
      expect(anonymizer.anonymize("a = xy + i", "r").text).toBe("a = xy + i");
      expect(anonymizer.anonymize("x = 'abc'", "r").text).toBe("x = 'abc'");
      expect(anonymizer.anonymize("Return None", "r").text).toBe("Return None");
    });

    it("uses a fresh nonce per invocation", () => {
      const a = anonymizer.anonymize("counter", "r1");
      const b = anonymizer.anonymize("counter", "r2");
      expect(a.mapping.nonce).not.toBe(b.mapping.nonce);
      expect(a.text).not.toBe(b.text);
    });
  });

  describe("restore", () => {
    it("round-trips text without placeholder-shaped tokens", () => {
      const samples = [
        "const userName = 'alice smith';",
        'const msg = "say \\"hello there\\"";',
        "function total(items) {\n  return items.reduce((a, b) => a + b, 0);\n}",
        "it's a plain sentence, isn't it",
        "",
      ];
      for (const sample of samples) {
        const { text, mapping } = anonymizer.anonymize(sample, "rt");
        const restored = anonymizer.restore(text, mapping);
        expect(restored.text).toBe(sample);
        expect(restored.unresolved).toEqual([]);
      }
    });

    it("replaces the longest placeholder first", () => {
      const mapping: AnonymizationMapping = {
        requestId: "r",
        nonce: "00000000",
        entries: new Map([
          ["anon_00000000_id1", "A"],
          ["anon_00000000_id12", "B"],
        ]),
      };
      expect(anonymizer.restore("anon_00000000_id12 anon_00000000_id1", mapping).text).toBe("B A");
    });

    it("keeps unknown placeholders verbatim and reports them", () => {
      const { mapping } = anonymizer.anonymize("counter", "r");
      const restored = anonymizer.restore("see anon_deadbeef_id9 here", mapping);
      expect(restored.text).toBe("see anon_deadbeef_id9 here");
      expect(restored.unresolved).toEqual(["anon_deadbeef_id9"]);
    });
  });
});
