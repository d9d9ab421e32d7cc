import type { Token } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set([
  "a",
  "an",
  "and",
  "are",
  "as",
  "at",
  "be",
  "but",
  "by",
  "for",
  "if",
  "in",
  "into",
  "is",
  "it",
  "no",
  "not",
  "of",
  "on",
  "or",
  "such",
  "that",
  "the",
  "their",
  "then",
  "there",
  "these",
  "they",
  "this",
  "to",
  "was",
  "will",
  "with",
]);

// Han, Hiragana and Katakana runs are words of their own; any other word starts
// on a letter or digit, may carry combining marks and stops where a CJK run starts
const WORD =
  /\p{Script=Han}+|\p{Script=Hiragana}+|[\p{Script=Katakana}ー]+|[\p{L}\p{N}](?:(?![\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}])[\p{L}\p{N}\p{M}])*/gu;

/**
 * Deterministic Unicode tokenizer:
 * - NFKC-normalizes the input (full-width forms fold to ASCII)
 * - splits on anything that is not a letter, digit or combining mark, and
 *   between Han, Hiragana and Katakana runs (so "ラズパイのインストール" is three words)
 * - optionally lowercases
 * - optionally removes stop words
 * - yields token positions (token index) and offsets into the normalized text
 *
 * No stemming. Positions count stop words even when they are dropped.
 */
export class SimpleTokenizer implements Tokenizer {
  private readonly stopWords: ReadonlySet<string>;

  constructor(stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS) {
    this.stopWords = stopWords;
  }

  *tokenize(text: string, options?: TokenizeOptions): Iterable<Token> {
    const normalizeCase = options?.normalizeCase ?? true;
    const removeStopWords = options?.removeStopWords ?? false;

    const source = text.normalize("NFKC");
    let position = 0;

    for (const match of source.matchAll(WORD)) {
      const start = match.index ?? 0;
      let term = match[0];
      if (normalizeCase) term = term.toLowerCase();

      if (!removeStopWords || !this.stopWords.has(term)) {
        yield { term, position, startOffset: start, endOffset: start + match[0].length };
      }

      position++;
    }
  }
}
