import type { DocId, ScoredHit } from "./types.js";

export interface VectorIndexStats {
  docCount: number;
  /** undefined until the first vector fixes it (or configured up front) */
  dimension: number | undefined;
}

/**
 * Nearest-neighbour index over fixed-dimension embeddings.
 *
 * Contract notes:
 * - dimension is uniform across the index
 * - stored vectors are copies; callers may reuse their arrays
 * - an update replaces the vector wholesale
 */
export interface VectorIndex {
  index(docId: DocId, vector: ArrayLike<number>): void;
  remove(docId: DocId): boolean;
  has(docId: DocId): boolean;
  /** Cosine similarity, descending, ties by docId ascending. */
  query(vector: ArrayLike<number>, limit: number): ScoredHit[];
  getStats(): VectorIndexStats;
}
