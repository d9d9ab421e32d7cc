import { describe, expect, it } from "vitest";
import { Bm25Ranker, MemoryInvertedIndex, MemorySparseIndex, bm25Idf } from "../index.js";

const K1 = 1.2;
const B = 0.75;

function bm25Term(idf: number, tf: number, len: number, avgdl: number): number {
  return (idf * (tf * (K1 + 1))) / (tf + K1 * (1 - B + B * (len / avgdl)));
}

function fruitIndex(): MemorySparseIndex {
  const index = new MemorySparseIndex();
  index.index({ id: "d1", text: "apple banana" });
  index.index({ id: "d2", text: "Apple apple cherry" });
  index.index({ id: "d3", text: "cherry date" });
  return index;
}

describe("MemorySparseIndex", () => {
  it("scores a single term with BM25", () => {
    const hits = fruitIndex().query("banana", 10);

    // N = 3, df = 1, |d1| = 2, avgdl = 7/3
    const expected = bm25Term(Math.log(1 + 2.5 / 1.5), 1, 2, 7 / 3);
    expect(hits).toHaveLength(1);
    expect(hits[0]!.docId).toBe("d1");
    expect(hits[0]!.rank).toBe(1);
    expect(hits[0]!.score).toBeCloseTo(expected, 12);
  });

  it("ranks by accumulated score across query terms", () => {
    const hits = fruitIndex().query("apple cherry", 10);
    const avgdl = 7 / 3;
    const idf2 = bm25Idf(3, 2);

    const d2 = bm25Term(idf2, 2, 3, avgdl) + bm25Term(idf2, 1, 3, avgdl);
    const d1 = bm25Term(idf2, 1, 2, avgdl);
    const d3 = bm25Term(idf2, 1, 2, avgdl);

    expect(hits.map((h) => h.docId)).toEqual(["d2", "d1", "d3"]);
    expect(hits.map((h) => h.rank)).toEqual([1, 2, 3]);
    expect(hits[0]!.score).toBeCloseTo(d2, 12);
    // d1 and d3 tie exactly: broken by id
    expect(hits[1]!.score).toBe(hits[2]!.score);
    expect(hits[1]!.score).toBeCloseTo(d1, 12);
    expect(d1).toBe(d3);
  });

  it("counts a repeated query term once", () => {
    const index = fruitIndex();
    expect(index.query("banana banana BANANA", 10)).toEqual(index.query("banana", 10));
  });

  it("returns an empty list when nothing overlaps", () => {
    const index = fruitIndex();
    expect(index.query("zebra", 10)).toEqual([]);
    expect(index.query("the of and", 10)).toEqual([]);
    expect(index.query("", 10)).toEqual([]);
  });

  it("applies the limit after ranking", () => {
    const hits = fruitIndex().query("apple cherry", 2);
    expect(hits.map((h) => h.docId)).toEqual(["d2", "d1"]);
    expect(fruitIndex().query("apple", 0)).toEqual([]);
  });

  it("keeps lengths and averages consistent across replace and remove", () => {
    const index = fruitIndex();
    expect(index.getStats()).toEqual({ docCount: 3, totalLength: 7, avgDocLen: 7 / 3 });

    index.index({ id: "d2", text: "cherry" });
    expect(index.getStats()).toEqual({ docCount: 3, totalLength: 5, avgDocLen: 5 / 3 });
    expect(index.query("apple", 10).map((h) => h.docId)).toEqual(["d1"]);

    expect(index.remove("d3")).toBe(true);
    expect(index.remove("d3")).toBe(false);
    expect(index.getStats()).toEqual({ docCount: 2, totalLength: 3, avgDocLen: 1.5 });
    expect(index.query("date", 10)).toEqual([]);
    expect(index.has("d3")).toBe(false);
  });

  it("uses the configured k1 and b", () => {
    const index = new MemorySparseIndex({ ranker: new Bm25Ranker({ k1: 2, b: 0 }) });
    index.index({ id: "a", text: "kiwi kiwi" });
    index.index({ id: "b", text: "lime" });

    // b = 0 removes length normalization: tf*(k1+1)/(tf+k1)
    const [hit] = index.query("kiwi", 10);
    expect(hit!.score).toBeCloseTo(bm25Idf(2, 1) * ((2 * 3) / (2 + 2)), 12);
  });

  it("exposes the processed query terms", () => {
    expect(fruitIndex().queryTerms("How to peel the Apple apple?")).toEqual(["peel", "apple"]);
    expect(fruitIndex().queryTerms("How to install the Apple apple?")).toEqual([
      "install",
      "apple",
      "インストール",
      "installation",
      "setup",
      "セットアップ",
    ]);
  });

  it("matches documents through query synonyms", () => {
    const index = fruitIndex();
    index.index({ id: "d4", text: "ラズパイにUbuntuをインストール" });
    expect(index.query("install", 10).map((h) => h.docId)).toEqual(["d4"]);
  });
});

describe("MemoryInvertedIndex", () => {
  it("drops a term once its last posting goes", () => {
    const index = new MemoryInvertedIndex();
    index.addDocument("a", new Map([["solo", 1]]), 1);
    expect(index.hasTerm("solo")).toBe(true);

    index.removeDocument("a");
    expect(index.hasTerm("solo")).toBe(false);
    expect(index.getPostings("solo")).toBeUndefined();
    expect(index.getStats()).toEqual({ docCount: 0, totalLength: 0, avgDocLen: 0 });
  });

  it("returns postings sorted by docId", () => {
    const index = new MemoryInvertedIndex();
    index.addDocument("z", new Map([["t", 2]]), 2);
    index.addDocument("m", new Map([["t", 1]]), 1);
    const pl = index.getPostings("t");
    expect(pl?.df).toBe(2);
    expect(pl?.postings).toEqual([
      { docId: "m", tf: 1 },
      { docId: "z", tf: 2 },
    ]);
  });
});
