import type { DocId, FusedResult, ResultSource, ScoreContribution, ScoredHit } from "../types.js";
import type { FuseOptions, RankFuser, ScoreNormalizer } from "../fusion.js";
import type { Comparator, TopKSelector } from "../heap.js";
import { compareIds } from "../heap.js";
import { MinMaxNormalizer } from "./minMaxNormalizer.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";

type Entry = {
  docId: DocId;
  sparse?: ScoreContribution;
  dense?: ScoreContribution;
  rrf: number;
};

/** A fused result with its best rank over both lists, used for ordering. */
export type RankedResult = { result: FusedResult; bestRank: number };

/** final desc, weighted desc, best source rank asc, docId asc */
const compareRanked: Comparator<RankedResult> = (a, b) =>
  b.result.score - a.result.score ||
  b.result.weightedScore - a.result.weightedScore ||
  a.bestRank - b.bestRank ||
  compareIds(a.result.docId, b.result.docId);

function sourceOf(e: Entry): ResultSource {
  if (e.sparse && e.dense) return "hybrid";
  return e.sparse ? "sparse" : "dense";
}

/**
 * Two-stage fusion of a sparse and a dense candidate list:
 *
 *   rrf(d)      = Σ_{lists containing d} 1 / (k + rank)
 *   weighted(d) = sparseWeight · sparse_norm(d) + denseWeight · dense_norm(d)
 *   final(d)    = alpha · weighted(d) + (1 − alpha) · minmax(rrf)(d)
 *
 * `rank` is the 1-based position in the list as given, and each list is
 * min-max normalized on its own. A document missing from a list contributes 0
 * for it, so an empty list degrades to a ranking of the other one.
 * Each list is expected to hold distinct docIds.
 *
 * Remaining ties go to the better rank in either list, so fusing a single list
 * keeps its order even when a zero weight and alpha 1 flatten every score.
 *
 * Fused scores are relative to the candidates of one call. A document ranked
 * first by one source can score lower in hybrid than in that source alone:
 * another document present in both lists takes the top RRF value, and its own
 * normalized RRF drops below 1.
 */
export class HybridRankFuser implements RankFuser {
  constructor(
    private readonly normalizer: ScoreNormalizer = new MinMaxNormalizer(),
    private readonly topK: TopKSelector<RankedResult> = new MinHeapTopKSelector<RankedResult>(),
  ) {}

  fuse(sparse: readonly ScoredHit[], dense: readonly ScoredHit[], options: FuseOptions): FusedResult[] {
    const entries = new Map<DocId, Entry>();

    const collect = (hits: readonly ScoredHit[], key: "sparse" | "dense"): void => {
      this.normalizer.normalize(hits).forEach((hit, i) => {
        const rank = i + 1;
        let entry = entries.get(hit.docId);
        if (!entry) {
          entry = { docId: hit.docId, rrf: 0 };
          entries.set(hit.docId, entry);
        }
        entry[key] = { raw: hit.score, normalized: hit.normalized, rank };
        entry.rrf += 1 / (options.rrfK + rank);
      });
    };

    collect(sparse, "sparse");
    collect(dense, "dense");

    const list = Array.from(entries.values());
    const rrfNormalized = this.normalizer.normalizeValues(list.map((e) => e.rrf));

    const fused = list.map((e, i): RankedResult => {
      const weightedScore =
        options.sparseWeight * (e.sparse?.normalized ?? 0) + options.denseWeight * (e.dense?.normalized ?? 0);
      const rrfScore = rrfNormalized[i] ?? 0;

      const result: FusedResult = {
        docId: e.docId,
        score: options.alpha * weightedScore + (1 - options.alpha) * rrfScore,
        weightedScore,
        rrfScore,
        source: sourceOf(e),
      };
      if (e.sparse) result.sparse = e.sparse;
      if (e.dense) result.dense = e.dense;
      return { result, bestRank: Math.min(e.sparse?.rank ?? Infinity, e.dense?.rank ?? Infinity) };
    });

    return this.topK.topK(fused, options.limit, compareRanked).map((r) => r.result);
  }
}
