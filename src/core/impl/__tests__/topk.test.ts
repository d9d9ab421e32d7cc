import { describe, expect, it } from "vitest";
import { MinHeapTopKSelector } from "../minHeapTopK.js";
import { byScoreThenId } from "../../heap.js";

describe("MinHeapTopKSelector", () => {
  it("returns best K by comparator", () => {
    const sel = new MinHeapTopKSelector<number>();
    const out = sel.topK([5, 1, 3, 2, 4], 3, (a, b) => b - a); // descending
    expect(out).toEqual([5, 4, 3]);
  });

  it("returns everything sorted when K exceeds the input", () => {
    const sel = new MinHeapTopKSelector<number>();
    expect(sel.topK([2, 9, 4], 10, (a, b) => b - a)).toEqual([9, 4, 2]);
  });

  it("returns nothing for K <= 0", () => {
    const sel = new MinHeapTopKSelector<number>();
    expect(sel.topK([1, 2, 3], 0, (a, b) => b - a)).toEqual([]);
  });

  it("breaks score ties by docId when cutting at K", () => {
    const sel = new MinHeapTopKSelector<{ docId: string; score: number }>();
    const out = sel.topK(
      [
        { docId: "c", score: 1 },
        { docId: "a", score: 1 },
        { docId: "d", score: 2 },
        { docId: "b", score: 1 },
      ],
      3,
      byScoreThenId,
    );
    expect(out.map((h) => h.docId)).toEqual(["d", "a", "b"]);
  });
});
