export { SimpleTokenizer } from "./simpleTokenizer.js";
export { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
export { Bm25Ranker, bm25Idf, DEFAULT_BM25 } from "./bm25Ranker.js";
export { MinHeapTopKSelector } from "./minHeapTopK.js";
export { LexiconQueryProcessor, loadQueryLexicon, type LexiconQueryProcessorOptions } from "./lexiconQueryProcessor.js";
export { MemorySparseIndex, type SparseIndexDeps } from "./memorySparseIndex.js";
export { MemoryDenseIndex, type DenseIndexOptions } from "./memoryDenseIndex.js";
export { MinMaxNormalizer } from "./minMaxNormalizer.js";
export { HybridRankFuser, type RankedResult } from "./hybridRankFuser.js";
export {
  HybridSearchEngine,
  createHybridSearchEngine,
  type Embedder,
  type EngineStats,
  type HybridSearchEngineOptions,
  type IngestFailure,
  type IngestReport,
  type SearchComparison,
  type SearchExplanation,
  type SearchRequest,
  type SearchResponse,
} from "./hybridSearchEngine.js";
