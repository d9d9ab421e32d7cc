import type { DocId, DocumentInput, ScoredHit, Term } from "./types.js";
import type { IndexStats } from "./invertedIndex.js";
import type { ProcessedQuery } from "./queryProcessor.js";

/**
 * Lexical index: owns tokenization, postings and BM25 scoring for a corpus.
 */
export interface SparseIndex {
  index(doc: DocumentInput): void;
  remove(docId: DocId): boolean;
  has(docId: DocId): boolean;
  /** Documents with nonzero term overlap, best first. Empty when nothing overlaps. */
  query(text: string, limit: number): ScoredHit[];
  /** How the query text is rewritten before scoring. */
  analyzeQuery(text: string): ProcessedQuery;
  /** The de-duplicated terms `query` would score for this text. */
  queryTerms(text: string): Term[];
  getStats(): IndexStats;
}
