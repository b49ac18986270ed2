/**
 * Zod schemas for scoring I/O: API request body, list query, structured LLM outputs,
 * and the on-disk record format of the file store.
 */

import { z } from "zod";
import { SCORING_METHODS } from "./types.js";

export const ScoringMethodSchema = z.enum(SCORING_METHODS);

const NonBlank = z.string().trim().min(1);

/** POST /score body (snake_case wire format). */
export const ScoreRequestBodySchema = z
  .object({
    source_lang: NonBlank,
    target_lang: NonBlank,
    source_text: NonBlank,
    target_text: NonBlank,
    method: ScoringMethodSchema,
  })
  .transform((b) => ({
    sourceLang: b.source_lang,
    targetLang: b.target_lang,
    sourceText: b.source_text,
    targetText: b.target_text,
    method: b.method,
  }));

/** GET /scores query. Query values arrive as strings. */
export const ListScoresQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(25),
  /** `?threshold=` means no filter, not 0. */
  threshold: z.preprocess((v) => (v === "" ? undefined : v), z.coerce.number().min(0).max(100).optional()),
  app_id: z.string().min(1).optional(),
});

export const MqmEvalSchema = z.object({
  score: z.number(),
  analysis: z.string(),
});
export type MqmEval = z.infer<typeof MqmEvalSchema>;

export const StructuredDaSchema = z.object({
  score: z.number(),
  adequacy: z.number(),
  fluency: z.number(),
  rationale: z.string(),
});
export type StructuredDa = z.infer<typeof StructuredDaSchema>;

export const TranslationScoreRecordSchema = z.object({
  id: z.string().min(1),
  appId: z.string(),
  sourceLang: z.string(),
  targetLang: z.string(),
  sourceText: z.string(),
  targetText: z.string(),
  scoringMethod: ScoringMethodSchema,
  llmModel: z.string(),
  score: z.number(),
  adequacyScore: z.number().nullable(),
  fluencyScore: z.number().nullable(),
  rationale: z.string().nullable(),
  rawLlmResponse: z.string().nullable(),
  createdAtISO: z.string(),
});
