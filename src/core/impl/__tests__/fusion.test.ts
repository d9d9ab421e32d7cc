import { describe, expect, it } from "vitest";
import { HybridRankFuser, MinMaxNormalizer } from "../index.js";
import type { FuseOptions } from "../../fusion.js";
import type { ScoredHit } from "../../types.js";

function hits(...entries: Array<[string, number]>): ScoredHit[] {
  return entries.map(([docId, score], i) => ({ docId, score, rank: i + 1 }));
}

const DEFAULTS: FuseOptions = { sparseWeight: 0.6, denseWeight: 0.4, rrfK: 60, alpha: 0.7, limit: 10 };

describe("MinMaxNormalizer", () => {
  const normalizer = new MinMaxNormalizer();

  it("scales onto [0,1] over the given values", () => {
    expect(normalizer.normalizeValues([3, 1, 2])).toEqual([1, 0, 0.5]);
  });

  it("collapses a single value or a zero range to 1", () => {
    expect(normalizer.normalizeValues([0.25])).toEqual([1]);
    expect(normalizer.normalizeValues([2, 2, 2])).toEqual([1, 1, 1]);
    expect(normalizer.normalizeValues([])).toEqual([]);
  });

  it("is local to the list: the same raw score normalizes differently", () => {
    const a = normalizer.normalize(hits(["x", 4], ["y", 2]));
    const b = normalizer.normalize(hits(["x", 4], ["y", 0]));
    expect(a.map((h) => h.normalized)).toEqual([1, 0]);
    expect(b.find((h) => h.docId === "x")?.normalized).toBe(1);
    expect(normalizer.normalize(hits(["p", 8], ["x", 4], ["y", 0])).find((h) => h.docId === "x")?.normalized).toBe(
      0.5,
    );
  });

  it("keeps docId and rank", () => {
    expect(normalizer.normalize(hits(["a", 5], ["b", 1]))).toEqual([
      { docId: "a", score: 5, rank: 1, normalized: 1 },
      { docId: "b", score: 1, rank: 2, normalized: 0 },
    ]);
  });
});

describe("HybridRankFuser", () => {
  const fuser = new HybridRankFuser();

  it("blends weighted normalized scores with normalized RRF", () => {
    const sparse = hits(["a", 4], ["b", 2], ["c", 0]);
    const dense = hits(["b", 0.9], ["d", 0.5], ["a", 0.1]);

    const rrf = {
      a: 1 / 61 + 1 / 63,
      b: 1 / 62 + 1 / 61,
      c: 1 / 63,
      d: 1 / 62,
    };
    const rrfRange = rrf.b - rrf.c;
    const rrfNorm = (v: number) => (v - rrf.c) / rrfRange;

    // sparse_norm: a 1, b 0.5, c 0 / dense_norm: b 1, d 0.5, a 0
    const weighted = { a: 0.6, b: 0.6 * 0.5 + 0.4, c: 0, d: 0.4 * 0.5 };

    const out = fuser.fuse(sparse, dense, DEFAULTS);
    expect(out.map((r) => r.docId)).toEqual(["b", "a", "d", "c"]);
    expect(out.map((r) => r.source)).toEqual(["hybrid", "hybrid", "dense", "sparse"]);

    const byId = new Map(out.map((r) => [r.docId, r]));
    expect(byId.get("b")!.score).toBeCloseTo(0.7 * weighted.b + 0.3, 12);
    expect(byId.get("a")!.score).toBeCloseTo(0.7 * weighted.a + 0.3 * rrfNorm(rrf.a), 12);
    expect(byId.get("d")!.score).toBeCloseTo(0.7 * weighted.d + 0.3 * rrfNorm(rrf.d), 12);
    expect(byId.get("c")!.score).toBe(0);

    expect(byId.get("a")!.sparse).toEqual({ raw: 4, normalized: 1, rank: 1 });
    expect(byId.get("a")!.dense).toEqual({ raw: 0.1, normalized: 0, rank: 3 });
    expect(byId.get("d")!.sparse).toBeUndefined();
    expect(byId.get("b")!.rrfScore).toBe(1);
    expect(byId.get("c")!.rrfScore).toBe(0);
  });

  it("returns results sorted by final score", () => {
    const out = fuser.fuse(
      hits(["a", 9], ["b", 7], ["c", 6], ["d", 1]),
      hits(["d", 0.8], ["e", 0.7], ["a", 0.6], ["f", 0.2]),
      DEFAULTS,
    );
    for (let i = 1; i < out.length; i++) {
      expect(out[i - 1]!.score).toBeGreaterThanOrEqual(out[i]!.score);
    }
  });

  it("breaks final-score ties by weighted score before docId", () => {
    // z-doc: weighted 1, rrf_norm 0 / a-doc: weighted 0, rrf_norm 1 -> both 0.5
    const out = fuser.fuse(hits(["z-doc", 5], ["a-doc", 1]), hits(["a-doc", 0.9]), {
      ...DEFAULTS,
      sparseWeight: 1,
      denseWeight: 0,
      alpha: 0.5,
    });
    expect(out.map((r) => [r.docId, r.score, r.weightedScore])).toEqual([
      ["z-doc", 0.5, 1],
      ["a-doc", 0.5, 0],
    ]);
  });

  it("keeps the list order when scores tie", () => {
    const out = fuser.fuse(hits(["y", 2], ["x", 2]), [], { ...DEFAULTS, sparseWeight: 1, alpha: 1 });
    expect(out.map((r) => r.docId)).toEqual(["y", "x"]);
  });

  it("keeps a single list's order when a zero weight flattens every score", () => {
    const sparse = hits(["c", 3], ["b", 2], ["a", 1]);
    const out = fuser.fuse(sparse, [], { ...DEFAULTS, sparseWeight: 0, alpha: 1 });
    expect(out.map((r) => [r.docId, r.score])).toEqual([
      ["c", 0],
      ["b", 0],
      ["a", 0],
    ]);
  });

  it("breaks remaining ties by docId", () => {
    // same weighted score, same RRF, both rank 1
    const out = fuser.fuse(hits(["y", 1]), hits(["x", 1]), { ...DEFAULTS, sparseWeight: 0.5, denseWeight: 0.5 });
    expect(out.map((r) => r.docId)).toEqual(["x", "y"]);
  });

  it("can score a top sparse hit lower in hybrid than in sparse alone", () => {
    const sparse = hits(["x", 2], ["y", 1]);
    const dense = hits(["y", 0.9], ["d2", 0.8], ["d3", 0.7], ["d4", 0.6], ["x", 0.5]);

    const alone = fuser.fuse(sparse, [], DEFAULTS).find((r) => r.docId === "x");
    const fused = fuser.fuse(sparse, dense, DEFAULTS).find((r) => r.docId === "x");

    // y holds the top RRF, d4 the lowest; x: weighted 0.6 (sparse 1, dense 0)
    const rrfX = 1 / 61 + 1 / 65;
    const rrfY = 1 / 62 + 1 / 61;
    const rrfNormX = (rrfX - 1 / 64) / (rrfY - 1 / 64);

    expect(alone?.score).toBeCloseTo(0.7 * 0.6 + 0.3, 12);
    expect(fused?.weightedScore).toBeCloseTo(0.6, 12);
    expect(fused?.score).toBeCloseTo(0.7 * 0.6 + 0.3 * rrfNormX, 12);
    expect(fused?.score).toBeLessThan(alone?.score ?? 0);
  });

  it("degrades to the dense ranking when the sparse list is empty", () => {
    const out = fuser.fuse([], hits(["a", 0.9], ["b", 0.5]), DEFAULTS);
    expect(out.map((r) => [r.docId, r.source])).toEqual([
      ["a", "dense"],
      ["b", "dense"],
    ]);
    expect(out[0]!.score).toBeCloseTo(0.7 * 0.4 + 0.3, 12);
    expect(out[1]!.score).toBe(0);
    expect(out.every((r) => r.sparse === undefined)).toBe(true);
  });

  it("reduces to pure rank order of the dense list with alpha 0", () => {
    const dense = hits(["c", 0.91], ["a", 0.9], ["e", 0.3], ["b", 0.1]);
    const out = fuser.fuse([], dense, { ...DEFAULTS, sparseWeight: 0, denseWeight: 1, alpha: 0 });
    expect(out.map((r) => r.docId)).toEqual(["c", "a", "e", "b"]);
    expect(out[0]!.score).toBe(1);
    expect(out[3]!.score).toBe(0);
  });

  it("truncates to the limit", () => {
    const out = fuser.fuse(hits(["a", 3], ["b", 2], ["c", 1]), [], { ...DEFAULTS, limit: 2 });
    expect(out.map((r) => r.docId)).toEqual(["a", "b"]);
  });

  it("returns nothing when both lists are empty", () => {
    expect(fuser.fuse([], [], DEFAULTS)).toEqual([]);
  });
});
