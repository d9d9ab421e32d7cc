import type { FusedResult, ScoredHit } from "./types.js";

/** A raw hit paired with its score mapped onto [0,1]. */
export interface NormalizedHit extends ScoredHit {
  normalized: number;
}

/**
 * Maps one list's raw scores onto a comparable scale.
 *
 * Normalization is local to the list it is given (one query's candidates),
 * so the same raw score can normalize differently across queries.
 */
export interface ScoreNormalizer {
  normalize(hits: readonly ScoredHit[]): NormalizedHit[];
  /** Same policy over bare values, order preserved. */
  normalizeValues(values: readonly number[]): number[];
}

export interface FuseOptions {
  sparseWeight: number;
  denseWeight: number;
  /** RRF constant k in 1 / (k + rank). */
  rrfK: number;
  /** Blend between the weighted score (alpha) and normalized RRF (1 - alpha). */
  alpha: number;
  limit: number;
}

/**
 * Merges a sparse-ranked and a dense-ranked list into one ordering.
 * Either list may be empty.
 */
export interface RankFuser {
  fuse(sparse: readonly ScoredHit[], dense: readonly ScoredHit[], options: FuseOptions): FusedResult[];
}
