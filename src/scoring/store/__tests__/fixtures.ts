import type { NewTranslationScore } from "../../types.js";

export function newScore(overrides: Partial<NewTranslationScore> = {}): NewTranslationScore {
  return {
    appId: "app-1",
    sourceLang: "English",
    targetLang: "German",
    sourceText: "The cat sleeps.",
    targetText: "Die Katze schläft.",
    scoringMethod: "GEMBA-DA",
    llmModel: "test-model",
    score: 90,
    adequacyScore: null,
    fluencyScore: null,
    rationale: null,
    rawLlmResponse: "90",
    ...overrides,
  };
}
