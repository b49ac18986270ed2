/**
 * Scoring domain types: requests, computations, persisted records.
 */

export const SCORING_METHODS = ["GEMBA-DA", "GEMBA-MQM", "GEMBA-ESA", "STRUCTURED-DA"] as const;

export type ScoringMethod = (typeof SCORING_METHODS)[number];

export interface ScoreRequest {
  sourceLang: string;
  targetLang: string;
  sourceText: string;
  targetText: string;
  method: ScoringMethod;
}

/** Result of one orchestrated scoring call, before persistence. */
export interface ScoreComputation {
  method: ScoringMethod;
  /** Nominally 0-100; passed through unclamped. */
  score: number;
  llmModel: string;
  /** Raw LLM output kept for audit. */
  rawResponse: string;
  /** 0-5, STRUCTURED-DA only. */
  adequacy: number | null;
  /** 0-5, STRUCTURED-DA only. */
  fluency: number | null;
  rationale: string | null;
}

export interface TranslationScoreRecord {
  id: string;
  appId: string;
  sourceLang: string;
  targetLang: string;
  sourceText: string;
  targetText: string;
  scoringMethod: ScoringMethod;
  llmModel: string;
  score: number;
  adequacyScore: number | null;
  fluencyScore: number | null;
  rationale: string | null;
  rawLlmResponse: string | null;
  createdAtISO: string;
}

/** Fields supplied by the caller; the store assigns id and createdAtISO. */
export type NewTranslationScore = Omit<TranslationScoreRecord, "id" | "createdAtISO">;
