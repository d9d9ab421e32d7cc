import type { DocId, ScoredHit } from "../types.js";
import type { VectorIndex, VectorIndexStats } from "../vectorIndex.js";
import type { TopKSelector } from "../heap.js";
import { byScoreThenId } from "../heap.js";
import { DimensionMismatchError, InvalidVectorError } from "../errors.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";

type StoredVector = {
  readonly values: Float64Array;
  readonly norm: number;
};

type Candidate = { docId: DocId; score: number };

function toStored(vector: ArrayLike<number>): StoredVector {
  if (vector.length === 0) throw new InvalidVectorError("vector is empty");

  const values = Float64Array.from(vector);
  let sumSq = 0;
  for (let i = 0; i < values.length; i++) {
    const v = values[i]!;
    if (!Number.isFinite(v)) throw new InvalidVectorError(`component ${i} is not a finite number`);
    sumSq += v * v;
  }
  return { values, norm: Math.sqrt(sumSq) };
}

function cosine(a: StoredVector, b: StoredVector): number {
  // zero vectors have no direction
  if (a.norm === 0 || b.norm === 0) return 0;
  let dot = 0;
  for (let i = 0; i < a.values.length; i++) dot += a.values[i]! * b.values[i]!;
  return dot / (a.norm * b.norm);
}

export interface DenseIndexOptions {
  /** Fix the dimension up front instead of taking it from the first vector. */
  dimension?: number;
  topK?: TopKSelector<Candidate>;
}

/**
 * Exact (brute-force) cosine nearest-neighbour index.
 *
 * Vectors are copied into Float64Arrays with their norm precomputed and are
 * never mutated afterwards: `index` on an existing id swaps in a new entry.
 * Once fixed, the dimension stays fixed even if the index empties.
 */
export class MemoryDenseIndex implements VectorIndex {
  private readonly vectors = new Map<DocId, StoredVector>();
  private readonly topK: TopKSelector<Candidate>;
  private dimension: number | undefined;

  constructor(options: DenseIndexOptions = {}) {
    this.dimension = options.dimension;
    this.topK = options.topK ?? new MinHeapTopKSelector<Candidate>();
  }

  index(docId: DocId, vector: ArrayLike<number>): void {
    this.checkDimension(vector.length);
    const stored = toStored(vector);
    if (this.dimension === undefined) this.dimension = stored.values.length;
    this.vectors.set(docId, stored);
  }

  remove(docId: DocId): boolean {
    return this.vectors.delete(docId);
  }

  has(docId: DocId): boolean {
    return this.vectors.has(docId);
  }

  query(vector: ArrayLike<number>, limit: number): ScoredHit[] {
    this.checkDimension(vector.length);
    const q = toStored(vector);
    if (limit <= 0 || this.vectors.size === 0) return [];

    const candidates: Candidate[] = [];
    for (const [docId, stored] of this.vectors) {
      candidates.push({ docId, score: cosine(q, stored) });
    }

    return this.topK
      .topK(candidates, limit, byScoreThenId)
      .map((c, i) => ({ docId: c.docId, score: c.score, rank: i + 1 }));
  }

  getStats(): VectorIndexStats {
    return { docCount: this.vectors.size, dimension: this.dimension };
  }

  private checkDimension(actual: number): void {
    if (this.dimension !== undefined && actual !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, actual);
    }
  }
}
