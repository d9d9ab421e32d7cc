import type { DocId, Term } from "./types.js";

export interface Posting {
  docId: DocId;
  /** term frequency within the doc */
  tf: number;
}

export interface PostingsList {
  term: Term;
  df: number;
  postings: Posting[];
}

export interface IndexStats {
  docCount: number;
  /** sum of all document lengths in tokens */
  totalLength: number;
  /** average document length in tokens, 0 for an empty index */
  avgDocLen: number;
}

/**
 * Inverted index mapping term -> postings, plus the length statistics BM25 needs.
 *
 * Contract notes:
 * - `addDocument` replaces any postings previously held for the same docId
 * - `getPostings` returns postings sorted by docId for efficient merge/intersect
 * - length, total and average stay consistent across add/replace/remove
 */
export interface InvertedIndex {
  addDocument(docId: DocId, termFrequencies: Map<Term, number>, docLength: number): void;
  /** Returns false when the document was not indexed. */
  removeDocument(docId: DocId): boolean;

  getPostings(term: Term): PostingsList | undefined;
  hasTerm(term: Term): boolean;
  hasDocument(docId: DocId): boolean;
  getDocLength(docId: DocId): number | undefined;

  getStats(): IndexStats;
}
