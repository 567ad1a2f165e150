import { describe, expect, it } from "vitest";

import {
  CountingDocumentFrequencyAggregator,
  DegenerateNormError,
  LogTfIdfWeighter,
  inverseDocumentFrequency,
  termFrequency,
} from "../../index.js";
import type { DocumentFrequencyTable, ScoredDocument } from "../../index.js";

function table(docs: Record<string, Record<string, number>>): DocumentFrequencyTable {
  return new Map(Object.entries(docs).map(([id, counts]): [string, Map<string, number>] => [id, new Map(Object.entries(counts))]));
}

function score(t: DocumentFrequencyTable, zeroNorm?: "zero" | "throw"): Map<string, ScoredDocument> {
  const df = new CountingDocumentFrequencyAggregator().aggregate(t);
  return new LogTfIdfWeighter().compute(t, df, t.size, { zeroNorm });
}

function l2(doc: ScoredDocument): number {
  let s = 0;
  for (const w of doc.values()) s += w * w;
  return Math.sqrt(s);
}

describe("termFrequency", () => {
  it("is ln(1 + count / total)", () => {
    expect(termFrequency(3, 5)).toBeCloseTo(Math.log(1.6), 15);
    expect(termFrequency(5, 5)).toBeCloseTo(Math.LN2, 15);
  });

  it("never decreases as a token's count grows", () => {
    const rest = 5;
    let prev = termFrequency(0, rest);
    for (let c = 1; c <= 50; c++) {
      const cur = termFrequency(c, c + rest);
      expect(cur).toBeGreaterThanOrEqual(prev);
      prev = cur;
    }
  });

  it("is zero when the document has no terms", () => {
    expect(termFrequency(0, 0)).toBe(0);
  });
});

describe("inverseDocumentFrequency", () => {
  it("is 1 for a single-document corpus", () => {
    expect(inverseDocumentFrequency(1, 1)).toBe(1);
  });

  it("adds 1 only when every document has the token", () => {
    expect(inverseDocumentFrequency(4, 4)).toBe(1);
    expect(inverseDocumentFrequency(1, 4)).toBeCloseTo(Math.log(4), 15);
    expect(inverseDocumentFrequency(3, 4)).toBeCloseTo(Math.log(4 / 3), 15);
  });

  it("rejects document frequencies outside [1, N]", () => {
    expect(() => inverseDocumentFrequency(0, 3)).toThrow(RangeError);
    expect(() => inverseDocumentFrequency(4, 3)).toThrow(RangeError);
  });
});

describe("LogTfIdfWeighter", () => {
  it("scores a single-document corpus", () => {
    const doc = score(table({ doc1: { cat: 3, sat: 2 } })).get("doc1");
    expect(doc?.get("cat")).toBeCloseTo(0.8131149374929539, 12);
    expect(doc?.get("sat")).toBeCloseTo(0.5821031681977256, 12);
  });

  it("scores across documents with shared and unique tokens", () => {
    const out = score(
      table({
        d1: { cat: 3, dog: 1 },
        d2: { cat: 2, fish: 2 },
      }),
    );
    expect(out.get("d1")?.get("cat")).toBeCloseTo(0.9638624470463933, 12);
    expect(out.get("d1")?.get("dog")).toBeCloseTo(0.2664004188692999, 12);
    expect(out.get("d2")?.get("cat")).toBeCloseTo(0.8218691629851074, 12);
    expect(out.get("d2")?.get("fish")).toBeCloseTo(0.5696762931122893, 12);
  });

  it("normalizes every non-degenerate document to unit length", () => {
    const t = table({
      a: { alpha: 4, beta: 1, gamma: 7 },
      b: { beta: 2, delta: 1 },
      c: { alpha: 1, epsilon: 3, zeta: 3 },
    });
    for (const doc of score(t).values()) {
      expect(Math.abs(l2(doc) - 1)).toBeLessThan(1e-9);
    }
  });

  it("keeps exactly the tokens of each source document", () => {
    const t = table({
      a: { alpha: 4, beta: 1 },
      b: { beta: 2, delta: 1, omega: 0 },
    });
    const out = score(t);
    for (const [id, counts] of t) {
      expect([...(out.get(id)?.keys() ?? [])].sort()).toEqual([...counts.keys()].sort());
    }
  });

  it("returns an empty document for an empty table", () => {
    const out = score(table({ full: { cat: 1 }, empty: {} }));
    expect(out.get("empty")?.size).toBe(0);
  });

  it("weights every token 0 when the norm is zero", () => {
    const doc = score(table({ d: { cat: 0, dog: 0 } })).get("d");
    expect(Object.fromEntries(doc ?? [])).toEqual({ cat: 0, dog: 0 });
  });

  it("throws DegenerateNormError when asked to", () => {
    expect(() => score(table({ d: { cat: 0, dog: 0 } }), "throw")).toThrow(DegenerateNormError);
  });

  it("rejects a token missing from the document frequencies", () => {
    const t = table({ d: { cat: 1 } });
    expect(() => new LogTfIdfWeighter().compute(t, new Map(), 1)).toThrow(RangeError);
  });
});
