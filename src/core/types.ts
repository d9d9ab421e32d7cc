/** Shared core types used by module contracts. */

export type DocId = string;
export type Term = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: Term;
  /** 0-based position within the source text (token index, not byte offset). */
  position: number;
  /** Character offsets into the normalized text. */
  startOffset?: number;
  endOffset?: number;
}

/** Structured metadata carried alongside a document (category, tags, timestamps...). */
export interface DocumentMetadata {
  category?: string;
  tags?: string[];
  [key: string]: unknown;
}

/** Minimal document representation used by the indexing pipeline. */
export interface DocumentInput {
  id: DocId;
  text: string;
  metadata?: DocumentMetadata;
}

/** One entry of a single retrieval pass. Never persisted. */
export interface ScoredHit {
  docId: DocId;
  /** Raw score on the source's own scale (BM25 or cosine). */
  score: number;
  /** 1-based position within the source list. */
  rank: number;
}

export type SearchMode = "sparse-only" | "dense-only" | "hybrid";

/** Which candidate lists a fused result appeared in. */
export type ResultSource = "sparse" | "dense" | "hybrid";

export interface ScoreContribution {
  raw: number;
  /** Min-max normalized over the candidates of this query. */
  normalized: number;
  rank: number;
}

export interface FusedResult {
  docId: DocId;
  /** alpha * weightedScore + (1 - alpha) * normalized RRF */
  score: number;
  weightedScore: number;
  /** Normalized reciprocal-rank component. */
  rrfScore: number;
  sparse?: ScoreContribution;
  dense?: ScoreContribution;
  source: ResultSource;
  metadata?: DocumentMetadata;
}
