import { z } from "zod";

import { InvalidConfigError, InvalidWeightsError } from "./errors.js";

// --- Schemas ---

export const Bm25ConfigSchema = z.object({
  /** Term-frequency saturation (default: 1.2) */
  k1: z.number().finite().nonnegative().default(1.2),
  /** Length normalization, 0 = none, 1 = full (default: 0.75) */
  b: z.number().min(0).max(1).default(0.75),
});

export const FusionConfigSchema = z.object({
  /** Weight of the normalized BM25 score (default: 0.6) */
  sparseWeight: z.number().finite().nonnegative().default(0.6),
  /** Weight of the normalized cosine score (default: 0.4) */
  denseWeight: z.number().finite().nonnegative().default(0.4),
  /** RRF constant k in 1 / (k + rank) (default: 60) */
  rrfK: z.number().finite().nonnegative().default(60),
  /** Share of the weighted score in the final blend (default: 0.7) */
  alpha: z.number().min(0).max(1).default(0.7),
  /** Results returned per query (default: 10) */
  limit: z.number().int().positive().default(10),
  /** Hits kept from each retrieval branch before fusion (default: limit * 2) */
  candidateLimit: z.number().int().positive().optional(),
});

export const QueryConfigSchema = z.object({
  /** Append synonym variants to sparse queries (default: true) */
  expandSynonyms: z.boolean().default(true),
  /** Lexicon JSON file; the bundled data/query-lexicon.json when omitted */
  lexiconPath: z.string().min(1).optional(),
});

export const EngineConfigSchema = z.object({
  bm25: Bm25ConfigSchema.default({}),
  fusion: FusionConfigSchema.default({}),
  query: QueryConfigSchema.default({}),
  /** Fixed embedding dimension; inferred from the first vector when omitted */
  dimension: z.number().int().positive().optional(),
  /** Upper bound accepted for `limit` and `candidateLimit` (default: 100) */
  maxLimit: z.number().int().positive().default(100),
});

// --- Inferred Types ---

export type Bm25Config = Readonly<z.output<typeof Bm25ConfigSchema>>;
export type Bm25ConfigInput = z.input<typeof Bm25ConfigSchema>;
export type FusionConfig = Readonly<z.output<typeof FusionConfigSchema>>;
export type FusionConfigInput = z.input<typeof FusionConfigSchema>;
export type QueryConfig = Readonly<z.output<typeof QueryConfigSchema>>;

export interface EngineConfig {
  readonly bm25: Bm25Config;
  readonly fusion: FusionConfig;
  readonly query: QueryConfig;
  readonly dimension?: number;
  readonly maxLimit: number;
}
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

const WEIGHT_FIELDS = new Set<PropertyKey>(["sparseWeight", "denseWeight"]);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

function throwFusionError(error: z.ZodError, input: FusionConfigInput, pathOffset = 0): never {
  const weightIssue = error.issues.some((issue) => WEIGHT_FIELDS.has(issue.path[pathOffset] ?? ""));
  if (weightIssue) {
    throw new InvalidWeightsError(Number(input.sparseWeight), Number(input.denseWeight), { cause: error });
  }
  throw new InvalidConfigError(formatIssues(error), { cause: error });
}

/**
 * Validates fusion settings on top of `base` and returns a frozen config.
 * Per-request overrides win over the engine defaults.
 *
 * @throws InvalidWeightsError if a weight is negative or not finite
 * @throws InvalidConfigError for any other violation
 */
export function resolveFusionConfig(overrides: FusionConfigInput = {}, base?: FusionConfig): FusionConfig {
  const merged: FusionConfigInput = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }

  const parsed = FusionConfigSchema.safeParse(merged);
  if (!parsed.success) throwFusionError(parsed.error, merged);
  return Object.freeze(parsed.data);
}

/**
 * Type-safe config helper. Validates at runtime with zod and fills defaults.
 *
 * @throws InvalidWeightsError if a fusion weight is negative or not finite
 * @throws InvalidConfigError for any other violation
 */
export function defineConfig(input: EngineConfigInput = {}): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) throwFusionError(parsed.error, input.fusion ?? {}, 1);

  const { bm25, fusion, query, dimension, maxLimit } = parsed.data;
  if (fusion.limit > maxLimit) {
    throw new InvalidConfigError([`fusion.limit: must be at most maxLimit (${maxLimit})`]);
  }
  return Object.freeze({
    bm25: Object.freeze(bm25),
    fusion: Object.freeze(fusion),
    query: Object.freeze(query),
    dimension,
    maxLimit,
  });
}

// --- Environment ---

const envNumber = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.coerce.number().optional(),
);

const envString = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.string().optional(),
);

const envBoolean = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z
    .enum(["true", "false", "1", "0"])
    .transform((v) => v === "true" || v === "1")
    .optional(),
);

const EnvSchema = z.object({
  HYBRID_BM25_K1: envNumber,
  HYBRID_BM25_B: envNumber,
  HYBRID_SPARSE_WEIGHT: envNumber,
  HYBRID_DENSE_WEIGHT: envNumber,
  HYBRID_RRF_K: envNumber,
  HYBRID_ALPHA: envNumber,
  HYBRID_DEFAULT_LIMIT: envNumber,
  HYBRID_CANDIDATE_LIMIT: envNumber,
  HYBRID_DIMENSION: envNumber,
  HYBRID_MAX_LIMIT: envNumber,
  HYBRID_EXPAND_SYNONYMS: envBoolean,
  HYBRID_QUERY_LEXICON: envString,
});

/**
 * Builds an engine config from `HYBRID_*` environment variables.
 * Unset or blank variables fall back to the schema defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigError(formatIssues(parsed.error), { cause: parsed.error });
  }
  const e = parsed.data;

  return defineConfig({
    bm25: { k1: e.HYBRID_BM25_K1, b: e.HYBRID_BM25_B },
    fusion: {
      sparseWeight: e.HYBRID_SPARSE_WEIGHT,
      denseWeight: e.HYBRID_DENSE_WEIGHT,
      rrfK: e.HYBRID_RRF_K,
      alpha: e.HYBRID_ALPHA,
      limit: e.HYBRID_DEFAULT_LIMIT,
      candidateLimit: e.HYBRID_CANDIDATE_LIMIT,
    },
    query: { expandSynonyms: e.HYBRID_EXPAND_SYNONYMS, lexiconPath: e.HYBRID_QUERY_LEXICON },
    dimension: e.HYBRID_DIMENSION,
    maxLimit: e.HYBRID_MAX_LIMIT,
  });
}
