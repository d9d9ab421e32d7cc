import type { DocId, ScoredHit, Term } from "../types.js";
import type { RankContext, RankOptions, Ranker } from "../ranker.js";
import type { TopKSelector } from "../heap.js";
import { byScoreThenId } from "../heap.js";
import type { Bm25Config } from "../config.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";

export const DEFAULT_BM25: Bm25Config = Object.freeze({ k1: 1.2, b: 0.75 });

/** Probabilistic IDF with +1 inside the log so common terms never score negative. */
export function bm25Idf(docCount: number, df: number): number {
  return Math.log(1 + (docCount - df + 0.5) / (df + 0.5));
}

type Candidate = { docId: DocId; score: number };

/**
 * Okapi BM25:
 *
 *   score(d,q) = Σ_{t∈q} IDF(t) · tf·(k1+1) / (tf + k1·(1 − b + b·|d|/avgdl))
 *
 * - query terms are de-duplicated (each distinct term counts once)
 * - candidates are the union of the query terms' postings
 * - ranking is score desc, docId asc; `limit` is applied with a bounded heap
 */
export class Bm25Ranker implements Ranker {
  constructor(
    private readonly config: Bm25Config = DEFAULT_BM25,
    private readonly topK: TopKSelector<Candidate> = new MinHeapTopKSelector<Candidate>(),
  ) {}

  rank(queryTerms: Term[], ctx: RankContext, options?: RankOptions): ScoredHit[] {
    const { docCount, avgDocLen } = ctx.stats;
    if (!docCount || queryTerms.length === 0) return [];

    const { k1, b } = this.config;
    const scores = new Map<DocId, number>();

    for (const term of new Set(queryTerms)) {
      const pl = ctx.index.getPostings(term);
      if (!pl || pl.df === 0) continue;
      const idf = bm25Idf(docCount, pl.df);

      for (const p of pl.postings) {
        const len = ctx.index.getDocLength(p.docId) ?? avgDocLen;
        const relLen = avgDocLen > 0 ? len / avgDocLen : 1;
        const tfPart = (p.tf * (k1 + 1)) / (p.tf + k1 * (1 - b + b * relLen));
        scores.set(p.docId, (scores.get(p.docId) ?? 0) + idf * tfPart);
      }
    }

    const candidates: Candidate[] = Array.from(scores, ([docId, score]) => ({ docId, score }));
    const best = this.topK.topK(candidates, options?.limit ?? candidates.length, byScoreThenId);
    return best.map((c, i) => ({ docId: c.docId, score: c.score, rank: i + 1 }));
  }
}
