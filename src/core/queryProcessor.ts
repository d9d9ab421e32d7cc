import type { Term } from "./types.js";

/** What a query text turns into before it reaches the sparse ranker. */
export interface ProcessedQuery {
  original: string;
  /** NFKC, whitespace collapsed and trimmed */
  normalized: string;
  /** Query words left after dropping stop words and question words, first occurrence order. */
  keywords: Term[];
  /** Canonical names of the synonym groups the keywords hit. */
  technicalTerms: Term[];
  /** Terms added from those groups that the keywords did not already hold. */
  expansions: Term[];
  /** keywords followed by expansions: the terms BM25 scores. */
  terms: Term[];
}

export interface QueryProcessor {
  process(text: string): ProcessedQuery;
}
