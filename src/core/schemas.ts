/**
 * Zod schemas for engine inputs that arrive from outside the process
 * (ingest batches, search requests built from user input).
 */

import { z } from "zod";

export const MAX_ID_LENGTH = 256;
export const MAX_TEXT_LENGTH = 200_000;

export const SearchModeSchema = z.enum(["sparse-only", "dense-only", "hybrid"]);

export const SearchFiltersSchema = z.object({
  /** Exact category match */
  category: z.string().min(1).optional(),
  /** Document must carry every listed tag */
  tags: z.array(z.string().min(1)).optional(),
});

export const SearchInputSchema = z.object({
  query: z.string().max(4096, "query too long").optional(),
  mode: SearchModeSchema.default("hybrid"),
  filters: SearchFiltersSchema.optional(),
});

export const DocumentMetadataSchema = z
  .object({
    category: z.string().optional(),
    tags: z.array(z.string()).optional(),
  })
  .passthrough();

export const IngestDocumentSchema = z
  .object({
    id: z.string().min(1, "id must be non-empty").max(MAX_ID_LENGTH, "id too long"),
    text: z.string().min(1, "text must be non-empty").max(MAX_TEXT_LENGTH, "text too long").optional(),
    vector: z.array(z.number().finite()).min(1, "vector must be non-empty").optional(),
    metadata: DocumentMetadataSchema.optional(),
  })
  .superRefine((doc, ctx) => {
    if (doc.text === undefined && doc.vector === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "document must carry text, a vector, or both",
      });
    }
  });

/** Word lists and synonym groups used to rewrite sparse queries. */
export const QueryLexiconSchema = z.object({
  stopWords: z.array(z.string().min(1)),
  questionWords: z.array(z.string().min(1)),
  /** canonical term -> variants; a variant may span several words */
  synonyms: z.record(z.array(z.string().min(1)).min(1)),
});

export type SearchFilters = z.infer<typeof SearchFiltersSchema>;
export type QueryLexicon = z.infer<typeof QueryLexiconSchema>;
export type IngestDocument = z.input<typeof IngestDocumentSchema>;
