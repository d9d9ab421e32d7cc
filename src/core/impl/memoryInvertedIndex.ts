import type { DocId, Term } from "../types.js";
import type { InvertedIndex, IndexStats, Posting, PostingsList } from "../invertedIndex.js";
import { compareIds } from "../heap.js";

/**
 * Simple in-memory inverted index.
 *
 * Data structure:
 * - term -> (docId -> tf)
 * - docId -> terms it contributed (so removal touches only its own postings)
 * - docId -> length in tokens, with a running total
 *
 * The average length is cached and dropped on every mutation.
 * `getPostings()` materializes a sorted array by docId.
 */
export class MemoryInvertedIndex implements InvertedIndex {
  private readonly termToDocMap = new Map<Term, Map<DocId, number>>();
  private readonly docTerms = new Map<DocId, Term[]>();
  private readonly docLengths = new Map<DocId, number>();
  private totalLength = 0;
  private cachedAvgDocLen: number | undefined;

  addDocument(docId: DocId, termFrequencies: Map<Term, number>, docLength: number): void {
    this.removeDocument(docId);

    for (const [term, tf] of termFrequencies) {
      let docMap = this.termToDocMap.get(term);
      if (!docMap) {
        docMap = new Map();
        this.termToDocMap.set(term, docMap);
      }
      docMap.set(docId, tf);
    }

    this.docTerms.set(docId, Array.from(termFrequencies.keys()));
    this.docLengths.set(docId, docLength);
    this.totalLength += docLength;
    this.cachedAvgDocLen = undefined;
  }

  removeDocument(docId: DocId): boolean {
    const terms = this.docTerms.get(docId);
    if (!terms) return false;

    for (const term of terms) {
      const docMap = this.termToDocMap.get(term);
      if (!docMap) continue;
      docMap.delete(docId);
      // keep df == postings.length: no empty postings lists
      if (docMap.size === 0) this.termToDocMap.delete(term);
    }

    this.totalLength -= this.docLengths.get(docId) ?? 0;
    this.docTerms.delete(docId);
    this.docLengths.delete(docId);
    this.cachedAvgDocLen = undefined;
    return true;
  }

  getPostings(term: Term): PostingsList | undefined {
    const docMap = this.termToDocMap.get(term);
    if (!docMap) return undefined;

    const postings: Posting[] = [];
    for (const [docId, tf] of docMap) {
      postings.push({ docId, tf });
    }

    // sort for merge/intersection
    postings.sort((a, b) => compareIds(a.docId, b.docId));

    return {
      term,
      df: postings.length,
      postings,
    };
  }

  hasTerm(term: Term): boolean {
    return this.termToDocMap.has(term);
  }

  hasDocument(docId: DocId): boolean {
    return this.docTerms.has(docId);
  }

  getDocLength(docId: DocId): number | undefined {
    return this.docLengths.get(docId);
  }

  getStats(): IndexStats {
    const docCount = this.docTerms.size;
    if (this.cachedAvgDocLen === undefined) {
      this.cachedAvgDocLen = docCount > 0 ? this.totalLength / docCount : 0;
    }
    return { docCount, totalLength: this.totalLength, avgDocLen: this.cachedAvgDocLen };
  }
}
