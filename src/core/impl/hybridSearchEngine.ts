import type {
  DocId,
  DocumentMetadata,
  FusedResult,
  ResultSource,
  ScoredHit,
  SearchMode,
  Term,
} from "../types.js";
import type { IndexStats } from "../invertedIndex.js";
import type { SparseIndex } from "../sparseIndex.js";
import type { VectorIndex, VectorIndexStats } from "../vectorIndex.js";
import type { RankFuser } from "../fusion.js";
import type { ProcessedQuery } from "../queryProcessor.js";
import {
  defineConfig,
  loadConfigFromEnv,
  resolveFusionConfig,
  type EngineConfig,
  type EngineConfigInput,
  type FusionConfig,
  type FusionConfigInput,
} from "../config.js";
import { IngestDocumentSchema, SearchInputSchema, type SearchFilters } from "../schemas.js";
import {
  EmptyQueryError,
  HybridSearchError,
  InvalidConfigError,
  InvalidDocumentError,
  InvalidVectorError,
} from "../errors.js";
import { logger as defaultLogger, type Logger } from "../../observability/logger.js";
import { MemorySparseIndex } from "./memorySparseIndex.js";
import { MemoryDenseIndex } from "./memoryDenseIndex.js";
import { HybridRankFuser } from "./hybridRankFuser.js";
import { Bm25Ranker } from "./bm25Ranker.js";
import { LexiconQueryProcessor, loadQueryLexicon } from "./lexiconQueryProcessor.js";

/** Turns texts into embeddings. Only used for queries that arrive without a vector. */
export type Embedder = (texts: string[]) => Promise<number[][]>;

export type SearchRequest = FusionConfigInput & {
  /** Query text for the sparse branch (and for the embedder, if any). */
  query?: string;
  /** Precomputed query embedding for the dense branch. */
  vector?: readonly number[];
  mode?: SearchMode;
  filters?: SearchFilters;
};

export interface SearchResponse {
  query: string;
  mode: SearchMode;
  /** Number of results returned. */
  total: number;
  results: FusedResult[];
  tookMs: number;
}

export interface SearchExplanation extends SearchResponse {
  /** Sparse query rewriting; absent in dense-only mode. */
  analysis?: ProcessedQuery;
  queryTerms: Term[];
  config: FusionConfig & { candidateLimit: number };
  candidates: { sparse: number; dense: number };
  distribution: Record<ResultSource, number>;
}

export interface SearchComparison {
  query: string;
  sparse: SearchResponse;
  dense: SearchResponse;
  hybrid: SearchResponse;
}

export interface IngestFailure {
  /** Position in the submitted batch. */
  index: number;
  id: string | null;
  code: string;
  message: string;
}

export interface IngestReport {
  ingested: number;
  failed: number;
  failures: IngestFailure[];
}

export interface EngineStats {
  sparse: IndexStats;
  dense: VectorIndexStats;
}

export interface HybridSearchEngineOptions {
  config?: EngineConfigInput;
  sparse?: SparseIndex;
  dense?: VectorIndex;
  fuser?: RankFuser;
  embedder?: Embedder;
  logger?: Logger;
}

type Execution = {
  response: SearchResponse;
  fusion: FusionConfig;
  candidateLimit: number;
  sparseCount: number;
  denseCount: number;
};

function needsSparse(mode: SearchMode): boolean {
  return mode !== "dense-only";
}

function needsDense(mode: SearchMode): boolean {
  return mode !== "sparse-only";
}

function fusionOverrides(request: SearchRequest): FusionConfigInput {
  const { sparseWeight, denseWeight, rrfK, alpha, limit, candidateLimit } = request;
  return { sparseWeight, denseWeight, rrfK, alpha, limit, candidateLimit };
}

/** Own copy, so callers can neither change stored filter fields nor see later changes. */
function copyMetadata(metadata: DocumentMetadata): DocumentMetadata {
  const copy: DocumentMetadata = { ...metadata };
  if (metadata.tags) copy.tags = [...metadata.tags];
  return copy;
}

function matchesFilters(metadata: DocumentMetadata | undefined, filters: SearchFilters): boolean {
  if (filters.category !== undefined && metadata?.category !== filters.category) return false;
  if (filters.tags?.length) {
    const tags = new Set(metadata?.tags ?? []);
    if (!filters.tags.every((t) => tags.has(t))) return false;
  }
  return true;
}

/**
 * Hybrid search orchestrator.
 *
 * Search flow:
 * 1. validate weights, mode and query signal (nothing runs on invalid input)
 * 2. sparse and dense retrieval as two independent tasks, joined before fusion
 * 3. optional metadata filtering, cap each list at the candidate limit
 * 4. normalize + fuse, truncate to `limit`
 *
 * Index calls are synchronous, so each one reads a consistent view of its index.
 * The two indexes are not updated atomically together: during a batch ingest a
 * document may briefly exist in one and not yet in the other.
 */
export class HybridSearchEngine {
  readonly config: EngineConfig;
  private readonly sparse: SparseIndex;
  private readonly dense: VectorIndex;
  private readonly fuser: RankFuser;
  private readonly embedder: Embedder | undefined;
  private readonly logger: Logger;
  private readonly metadata = new Map<DocId, DocumentMetadata>();

  constructor(options: HybridSearchEngineOptions = {}) {
    this.config = defineConfig(options.config);
    this.sparse = options.sparse ?? this.createSparseIndex();
    this.dense = options.dense ?? new MemoryDenseIndex({ dimension: this.config.dimension });
    this.fuser = options.fuser ?? new HybridRankFuser();
    this.embedder = options.embedder;
    this.logger = options.logger ?? defaultLogger;
  }

  private createSparseIndex(): SparseIndex {
    const { lexiconPath, expandSynonyms } = this.config.query;
    return new MemorySparseIndex({
      ranker: new Bm25Ranker(this.config.bm25),
      queryProcessor: new LexiconQueryProcessor({ lexicon: loadQueryLexicon(lexiconPath), expandSynonyms }),
    });
  }

  // --- ingestion ---

  /** Inserts or replaces the lexical postings (and metadata) of a document. */
  indexText(id: DocId, text: string, metadata?: DocumentMetadata): void {
    this.sparse.index({ id, text, metadata });
    if (metadata) {
      this.metadata.set(id, copyMetadata(metadata));
    } else {
      this.metadata.delete(id);
    }
  }

  /** Inserts or replaces the embedding of a document. */
  indexVector(id: DocId, vector: readonly number[]): void {
    this.dense.index(id, vector);
  }

  /** Removes a document from both indexes. Returns false if neither held it. */
  remove(id: DocId): boolean {
    const fromSparse = this.sparse.remove(id);
    const fromDense = this.dense.remove(id);
    this.metadata.delete(id);
    return fromSparse || fromDense;
  }

  has(id: DocId): boolean {
    return this.sparse.has(id) || this.dense.has(id);
  }

  /**
   * Validates and indexes a batch. A bad document is reported in `failures`
   * and skipped; the rest of the batch still goes in.
   * The vector is stored before the text so a rejected vector leaves nothing behind.
   */
  indexDocuments(docs: readonly unknown[]): IngestReport {
    let ingested = 0;
    const failures: IngestFailure[] = [];

    docs.forEach((raw, index) => {
      const rawId =
        typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string" ? raw.id : null;

      try {
        const parsed = IngestDocumentSchema.safeParse(raw);
        if (!parsed.success) {
          const reason = parsed.error.issues.map((i) => i.message).join("; ");
          throw new InvalidDocumentError(rawId, reason, { cause: parsed.error });
        }

        const doc = parsed.data;
        if (doc.vector !== undefined) this.indexVector(doc.id, doc.vector);
        if (doc.text !== undefined) this.indexText(doc.id, doc.text, doc.metadata);
        ingested++;
      } catch (err) {
        const failure: IngestFailure = {
          index,
          id: rawId,
          code: err instanceof HybridSearchError ? err.code : "INTERNAL",
          message: err instanceof Error ? err.message : String(err),
        };
        failures.push(failure);
        this.logger.warn("ingest.document_failed", { ...failure });
      }
    });

    this.logger.info("ingest.batch", { ingested, failed: failures.length });
    return { ingested, failed: failures.length, failures };
  }

  stats(): EngineStats {
    return { sparse: this.sparse.getStats(), dense: this.dense.getStats() };
  }

  // --- querying ---

  async search(request: SearchRequest): Promise<SearchResponse> {
    const { response } = await this.execute(request);
    return response;
  }

  /** Runs the search and reports how the ranking came about. */
  async explain(request: SearchRequest): Promise<SearchExplanation> {
    const run = await this.execute(request);
    const distribution: Record<ResultSource, number> = { sparse: 0, dense: 0, hybrid: 0 };
    for (const r of run.response.results) distribution[r.source]++;

    const analysis = needsSparse(run.response.mode) ? this.sparse.analyzeQuery(run.response.query) : undefined;

    return {
      ...run.response,
      analysis,
      queryTerms: analysis?.terms ?? [],
      config: { ...run.fusion, candidateLimit: run.candidateLimit },
      candidates: { sparse: run.sparseCount, dense: run.denseCount },
      distribution,
    };
  }

  /** The same request under each mode, side by side. */
  async compare(request: Omit<SearchRequest, "mode">): Promise<SearchComparison> {
    const [sparse, dense, hybrid] = await Promise.all([
      this.search({ ...request, mode: "sparse-only" }),
      this.search({ ...request, mode: "dense-only" }),
      this.search({ ...request, mode: "hybrid" }),
    ]);
    return { query: hybrid.query, sparse, dense, hybrid };
  }

  private async execute(request: SearchRequest): Promise<Execution> {
    const started = Date.now();

    const fusion = resolveFusionConfig(fusionOverrides(request), this.config.fusion);
    this.checkLimits(fusion);

    const input = SearchInputSchema.safeParse(request);
    if (!input.success) {
      throw new InvalidConfigError(
        input.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        { cause: input.error },
      );
    }
    const { mode, filters } = input.data;
    const text = input.data.query ?? "";

    if (needsSparse(mode) && text.trim().length === 0) {
      throw new EmptyQueryError(mode, "query text is empty");
    }
    if (needsDense(mode) && request.vector === undefined) {
      if (!this.embedder) throw new EmptyQueryError(mode, "no query vector and no embedder configured");
      if (text.trim().length === 0) throw new EmptyQueryError(mode, "no query vector and no text to embed");
    }

    const candidateLimit = Math.max(fusion.candidateLimit ?? fusion.limit * 2, fusion.limit);
    // with filters, retrieve everything and cap after filtering
    const fetchLimit = filters ? Number.MAX_SAFE_INTEGER : candidateLimit;

    const [sparseHits, denseHits] = await Promise.all([
      needsSparse(mode) ? this.branch("sparse", async () => this.sparse.query(text, fetchLimit)) : [],
      needsDense(mode) ? this.branch("dense", async () => this.retrieveDense(mode, text, request.vector, fetchLimit)) : [],
    ]);

    const sparseList = this.narrow(sparseHits, filters, candidateLimit);
    const denseList = this.narrow(denseHits, filters, candidateLimit);

    const results = this.fuser
      .fuse(sparseList, denseList, {
        sparseWeight: fusion.sparseWeight,
        denseWeight: fusion.denseWeight,
        rrfK: fusion.rrfK,
        alpha: fusion.alpha,
        limit: fusion.limit,
      })
      .map((r) => {
        const metadata = this.metadata.get(r.docId);
        return metadata ? { ...r, metadata: copyMetadata(metadata) } : r;
      });

    const tookMs = Date.now() - started;
    this.logger.debug("search.completed", {
      mode,
      total: results.length,
      sparse_candidates: sparseList.length,
      dense_candidates: denseList.length,
      duration_ms: tookMs,
    });

    return {
      response: { query: text, mode, total: results.length, results, tookMs },
      fusion,
      candidateLimit,
      sparseCount: sparseList.length,
      denseCount: denseList.length,
    };
  }

  private checkLimits(fusion: FusionConfig): void {
    const { maxLimit } = this.config;
    const issues: string[] = [];
    if (fusion.limit > maxLimit) issues.push(`limit: must be at most ${maxLimit}`);
    if (fusion.candidateLimit !== undefined && fusion.candidateLimit > maxLimit) {
      issues.push(`candidateLimit: must be at most ${maxLimit}`);
    }
    if (issues.length) throw new InvalidConfigError(issues);
  }

  private async retrieveDense(
    mode: SearchMode,
    text: string,
    vector: readonly number[] | undefined,
    limit: number,
  ): Promise<ScoredHit[]> {
    if (vector !== undefined) return this.dense.query(vector, limit);

    if (!this.embedder) throw new EmptyQueryError(mode, "no query vector and no embedder configured");
    const [embedded] = await this.embedder([text]);
    if (!embedded) throw new InvalidVectorError("embedder returned no vector for the query");
    return this.dense.query(embedded, limit);
  }

  /** Runs one retrieval branch; a failure is logged and aborts the whole query. */
  private async branch(name: "sparse" | "dense", run: () => Promise<ScoredHit[]>): Promise<ScoredHit[]> {
    try {
      return await run();
    } catch (err) {
      this.logger.failure("search.branch_failed", err, { branch: name });
      throw err;
    }
  }

  private narrow(hits: ScoredHit[], filters: SearchFilters | undefined, candidateLimit: number): ScoredHit[] {
    if (!filters) return hits.slice(0, candidateLimit);
    return hits
      .filter((h) => matchesFilters(this.metadata.get(h.docId), filters))
      .slice(0, candidateLimit)
      .map((h, i) => ({ ...h, rank: i + 1 }));
  }
}

/**
 * Engine wired with the in-memory indexes. Without an explicit config the
 * `HYBRID_*` environment variables are read.
 */
export function createHybridSearchEngine(options: HybridSearchEngineOptions = {}): HybridSearchEngine {
  return new HybridSearchEngine({ ...options, config: options.config ?? loadConfigFromEnv() });
}
