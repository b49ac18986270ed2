/**
 * Drizzle schema for translation score persistence.
 */

import { doublePrecision, index, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";
import { SCORING_METHODS } from "../../scoring/types.js";

/** One row per successful scoring request. Append-only. */
export const translationScores = pgTable(
  "translation_scores",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    appId: text("app_id").notNull(),
    sourceLang: text("source_lang").notNull(),
    targetLang: text("target_lang").notNull(),
    sourceText: text("source_text").notNull(),
    targetText: text("target_text").notNull(),
    scoringMethod: text("scoring_method", { enum: SCORING_METHODS }).notNull(),
    llmModel: text("llm_model").notNull(),
    score: doublePrecision("score").notNull(),
    adequacyScore: doublePrecision("adequacy_score"),
    fluencyScore: doublePrecision("fluency_score"),
    rationale: text("rationale"),
    rawLlmResponse: text("raw_llm_response"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (t) => ({
    createdAtIdx: index("translation_scores_created_at_idx").on(t.createdAt),
    appIdIdx: index("translation_scores_app_id_idx").on(t.appId),
  })
);

export type TranslationScoreRow = typeof translationScores.$inferSelect;
