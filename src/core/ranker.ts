import type { ScoredHit, Term } from "./types.js";
import type { InvertedIndex, IndexStats } from "./invertedIndex.js";

export interface RankOptions {
  /** Keep only the best `limit` hits. */
  limit?: number;
}

export interface RankContext {
  index: InvertedIndex;
  stats: IndexStats;
}

/**
 * Scores documents for a query.
 *
 * Implementations return hits sorted by score descending, ties by docId ascending,
 * with 1-based ranks assigned after sorting.
 */
export interface Ranker {
  rank(queryTerms: Term[], ctx: RankContext, options?: RankOptions): ScoredHit[];
}
