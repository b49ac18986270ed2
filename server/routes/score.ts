import type { Request, Response } from "express";
import type { AppContext } from "../../src/context.js";
import { ScoringServiceError } from "../../src/scoring/errors.js";
import { ListScoresQuerySchema, ScoreRequestBodySchema } from "../../src/scoring/schemas.js";
import { PersistenceError } from "../../src/scoring/store/types.js";
import type { TranslationScoreRecord } from "../../src/scoring/types.js";
import { sendError, sendValidationError } from "../errors.js";

export const APP_ID_HEADER = "x-app-id";

/** Wire shape of a stored record (snake_case). */
export interface TranslationScoreResponse {
  id: string;
  app_id: string;
  source_lang: string;
  target_lang: string;
  source_text: string;
  target_text: string;
  scoring_method: string;
  llm_model: string;
  score: number;
  adequacy_score: number | null;
  fluency_score: number | null;
  rationale: string | null;
  raw_llm_response: string | null;
  created_at: string;
}

export function toResponse(r: TranslationScoreRecord): TranslationScoreResponse {
  return {
    id: r.id,
    app_id: r.appId,
    source_lang: r.sourceLang,
    target_lang: r.targetLang,
    source_text: r.sourceText,
    target_text: r.targetText,
    scoring_method: r.scoringMethod,
    llm_model: r.llmModel,
    score: r.score,
    adequacy_score: r.adequacyScore,
    fluency_score: r.fluencyScore,
    rationale: r.rationale,
    raw_llm_response: r.rawLlmResponse,
    created_at: r.createdAtISO,
  };
}

export function scorePost(ctx: AppContext) {
  return async (req: Request, res: Response): Promise<void> => {
    const appId = req.get(APP_ID_HEADER)?.trim();
    if (!appId) {
      sendError(res, 401, "MISSING_APP_ID", "Missing X-APP-ID header");
      return;
    }
    const parsed = ScoreRequestBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }
    const request = parsed.data;
    try {
      const result = await ctx.scoringService.score(request);
      const record = await ctx.store.append({
        appId,
        sourceLang: request.sourceLang,
        targetLang: request.targetLang,
        sourceText: request.sourceText,
        targetText: request.targetText,
        scoringMethod: result.method,
        llmModel: result.llmModel,
        score: result.score,
        adequacyScore: result.adequacy,
        fluencyScore: result.fluency,
        rationale: result.rationale,
        rawLlmResponse: result.rawResponse,
      });
      res.json({
        score: result.score,
        method_used: result.method,
        request_id: record.id,
        adequacy: result.adequacy,
        fluency: result.fluency,
        rationale: result.rationale,
      });
    } catch (e) {
      if (e instanceof ScoringServiceError) {
        console.error(`[score] ${request.method} failed (${e.code}):`, e.message);
        sendError(res, 500, e.code, e.message);
      } else if (e instanceof PersistenceError) {
        console.error("[score] persistence failed:", e.message);
        sendError(res, 500, e.code, e.message);
      } else {
        console.error("[score] unexpected error:", e);
        sendError(res, 500, "INTERNAL_ERROR", e instanceof Error ? e.message : String(e));
      }
    }
  };
}

export function scoresGet(ctx: AppContext) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = ListScoresQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }
    const { limit, threshold, app_id } = parsed.data;
    try {
      const records = await ctx.store.list({ limit, threshold, appId: app_id });
      res.json(records.map(toResponse));
    } catch (e) {
      console.error("[scores] list failed:", e instanceof Error ? e.message : e);
      if (e instanceof PersistenceError) {
        sendError(res, 500, e.code, e.message);
      } else {
        sendError(res, 500, "INTERNAL_ERROR", e instanceof Error ? e.message : String(e));
      }
    }
  };
}
