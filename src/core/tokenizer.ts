import type { Token } from "./types.js";

export interface TokenizeOptions {
  /** If true, fold case (lowercase after NFKC normalization). */
  normalizeCase?: boolean;
  /** If true, drop tokens that are common stop-words. */
  removeStopWords?: boolean;
}

/**
 * Turns text into a stream of tokens.
 *
 * Contract notes:
 * - must be deterministic for given input+options (sparse scores are reproducible)
 * - no stemming
 * - should avoid allocations where possible (iterators/generators ok)
 */
export interface Tokenizer {
  tokenize(text: string, options?: TokenizeOptions): Iterable<Token>;
}
