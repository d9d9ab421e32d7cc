import { readFileSync } from "node:fs";
import type { Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { ProcessedQuery, QueryProcessor } from "../queryProcessor.js";
import { QueryLexiconSchema, type QueryLexicon } from "../schemas.js";
import { InvalidConfigError } from "../errors.js";
import { SimpleTokenizer } from "./simpleTokenizer.js";

// resolves from src/core/impl and from dist/core/impl alike
const DEFAULT_LEXICON_URL = new URL("../../../data/query-lexicon.json", import.meta.url);

const HIRAGANA_ONLY = /^\p{Script=Hiragana}+$/u;
const NON_ASCII = /[^\x00-\x7F]/;

let defaultLexicon: QueryLexicon | undefined;

/**
 * Reads and validates a lexicon file. Without a path the bundled
 * `data/query-lexicon.json` is read once and cached.
 *
 * @throws InvalidConfigError if the file is missing, not JSON or malformed
 */
export function loadQueryLexicon(path?: string | URL): QueryLexicon {
  if (path === undefined && defaultLexicon) return defaultLexicon;

  const source = path ?? DEFAULT_LEXICON_URL;
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(source, "utf8"));
  } catch (err) {
    throw new InvalidConfigError([`query lexicon: cannot read ${String(source)}`], { cause: err });
  }

  const parsed = QueryLexiconSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((i) => `query lexicon ${i.path.join(".")}: ${i.message}`),
      { cause: parsed.error },
    );
  }
  if (path === undefined) defaultLexicon = parsed.data;
  return parsed.data;
}

export interface LexiconQueryProcessorOptions {
  lexicon?: QueryLexicon;
  /** Must match the tokenizer the index was built with. */
  tokenizer?: Tokenizer;
  /** Add the variants of matched synonym groups (default: true) */
  expandSynonyms?: boolean;
}

type SynonymGroup = { name: Term; variants: Term[][] };

/**
 * Rewrites query text for BM25:
 * 1. NFKC and whitespace normalization
 * 2. multi-character CJK stop and question phrases are cut out of the text,
 *    since they are not separated by spaces ("Dockerについて教えて")
 * 3. tokenization with the index tokenizer, then stop words, question words
 *    and kana-only tokens (particles, inflections) are dropped
 * 4. a synonym group matches when every word of one of its variants is a
 *    keyword; all words of all its variants are appended
 */
export class LexiconQueryProcessor implements QueryProcessor {
  private readonly tokenizer: Tokenizer;
  private readonly expandSynonyms: boolean;
  private readonly ignored: ReadonlySet<Term>;
  private readonly phrases: string[];
  private readonly groups: SynonymGroup[];

  constructor(options: LexiconQueryProcessorOptions = {}) {
    const lexicon = options.lexicon ?? loadQueryLexicon();
    this.tokenizer = options.tokenizer ?? new SimpleTokenizer();
    this.expandSynonyms = options.expandSynonyms ?? true;

    const words = [...lexicon.stopWords, ...lexicon.questionWords].map((w) => w.normalize("NFKC").toLowerCase());
    this.ignored = new Set(words);
    // longest first: "どのように" before "どの"
    this.phrases = words.filter((w) => w.length > 1 && NON_ASCII.test(w)).sort((a, b) => b.length - a.length);
    this.groups = Object.entries(lexicon.synonyms).map(([name, variants]) => ({
      name,
      variants: variants.map((v) => this.words(v)).filter((ws) => ws.length > 0),
    }));
  }

  process(text: string): ProcessedQuery {
    const normalized = text.normalize("NFKC").replace(/\s+/g, " ").trim();

    let stripped = normalized.toLowerCase();
    for (const phrase of this.phrases) stripped = stripped.replaceAll(phrase, " ");

    const keywords = Array.from(
      new Set(this.words(stripped, true).filter((t) => !this.ignored.has(t) && !HIRAGANA_ONLY.test(t))),
    );

    const present = new Set(keywords);
    const matched = this.groups.filter((g) => g.variants.some((v) => v.every((w) => present.has(w))));

    const expansions: Term[] = [];
    if (this.expandSynonyms) {
      for (const group of matched) {
        for (const word of group.variants.flat()) {
          if (present.has(word)) continue;
          present.add(word);
          expansions.push(word);
        }
      }
    }

    return {
      original: text,
      normalized,
      keywords,
      technicalTerms: matched.map((g) => g.name),
      expansions,
      terms: [...keywords, ...expansions],
    };
  }

  private words(text: string, removeStopWords = false): Term[] {
    return Array.from(this.tokenizer.tokenize(text, { normalizeCase: true, removeStopWords }), (t) => t.term);
  }
}
