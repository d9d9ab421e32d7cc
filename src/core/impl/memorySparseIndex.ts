import type { DocId, DocumentInput, ScoredHit, Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { InvertedIndex, IndexStats } from "../invertedIndex.js";
import type { Ranker } from "../ranker.js";
import type { SparseIndex } from "../sparseIndex.js";
import type { ProcessedQuery, QueryProcessor } from "../queryProcessor.js";
import { SimpleTokenizer } from "./simpleTokenizer.js";
import { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
import { Bm25Ranker } from "./bm25Ranker.js";
import { LexiconQueryProcessor } from "./lexiconQueryProcessor.js";

export interface SparseIndexDeps {
  tokenizer: Tokenizer;
  index: InvertedIndex;
  ranker: Ranker;
  queryProcessor: QueryProcessor;
}

/**
 * BM25 index over document text.
 *
 * Documents are tokenized with case folding and no stop-word removal, so
 * document lengths count every token. Query text goes through the query
 * processor first (stop and question words dropped, synonyms expanded).
 * All methods are synchronous: a query always sees one consistent state.
 */
export class MemorySparseIndex implements SparseIndex {
  private readonly deps: SparseIndexDeps;

  constructor(deps: Partial<SparseIndexDeps> = {}) {
    const tokenizer = deps.tokenizer ?? new SimpleTokenizer();
    this.deps = {
      tokenizer,
      index: deps.index ?? new MemoryInvertedIndex(),
      ranker: deps.ranker ?? new Bm25Ranker(),
      queryProcessor: deps.queryProcessor ?? new LexiconQueryProcessor({ tokenizer }),
    };
  }

  index(doc: DocumentInput): void {
    const termFreqs = new Map<Term, number>();
    let length = 0;

    for (const tok of this.deps.tokenizer.tokenize(doc.text, { normalizeCase: true })) {
      length++;
      termFreqs.set(tok.term, (termFreqs.get(tok.term) ?? 0) + 1);
    }

    this.deps.index.addDocument(doc.id, termFreqs, length);
  }

  remove(docId: DocId): boolean {
    return this.deps.index.removeDocument(docId);
  }

  has(docId: DocId): boolean {
    return this.deps.index.hasDocument(docId);
  }

  analyzeQuery(text: string): ProcessedQuery {
    return this.deps.queryProcessor.process(text);
  }

  queryTerms(text: string): Term[] {
    return this.analyzeQuery(text).terms;
  }

  query(text: string, limit: number): ScoredHit[] {
    if (limit <= 0) return [];

    return this.deps.ranker.rank(
      this.queryTerms(text),
      { index: this.deps.index, stats: this.deps.index.getStats() },
      { limit },
    );
  }

  getStats(): IndexStats {
    return this.deps.index.getStats();
  }
}
