export type * from "./types.js";
export type { Tokenizer, TokenizeOptions } from "./tokenizer.js";
export type { InvertedIndex, IndexStats, Posting, PostingsList } from "./invertedIndex.js";
export type { Ranker, RankContext, RankOptions } from "./ranker.js";
export type { SparseIndex } from "./sparseIndex.js";
export type { ProcessedQuery, QueryProcessor } from "./queryProcessor.js";
export type { VectorIndex, VectorIndexStats } from "./vectorIndex.js";
export type { FuseOptions, NormalizedHit, RankFuser, ScoreNormalizer } from "./fusion.js";
export { byScoreThenId, compareIds, type Comparator, type TopKSelector } from "./heap.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./schemas.js";
export * from "./impl/index.js";
