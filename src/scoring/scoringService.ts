/**
 * Scoring orchestrator: one strategy per ScoringMethod. Each strategy builds its prompts,
 * calls the gateway (ESA twice, sequentially) and normalizes the outcome into a ScoreComputation.
 * Holds no per-request state.
 */

import { GatewayError, type ChatMessage, type LlmGateway } from "../gateway/types.js";
import { ParseError, ScoringServiceError, UnsupportedMethodError } from "./errors.js";
import {
  gembaDaPrompt,
  gembaEsaErrorPrompt,
  gembaEsaScoringPrompt,
  gembaMqmMessages,
  structuredDaMessages,
} from "./prompts.js";
import { MqmEvalSchema, StructuredDaSchema } from "./schemas.js";
import type { ScoreComputation, ScoreRequest, ScoringMethod } from "./types.js";

/** Optionally signed integer or decimal. */
const NUMBER_TOKEN = /[-+]?\d+(?:\.\d+)?/g;

/**
 * Returns the last numeric token in `text`. Replies often reason through
 * intermediate numbers before the final score, so the last match wins.
 */
export function extractLastNumber(text: string): number {
  const matches = text.match(NUMBER_TOKEN);
  if (!matches || matches.length === 0) {
    throw new ParseError("Could not parse numeric score from LLM response");
  }
  return parseFloat(matches[matches.length - 1]);
}

type Strategy = (req: ScoreRequest) => Promise<ScoreComputation>;

export interface ScoringServiceOptions {
  /** Log prompts, raw replies and parsed outputs. */
  debug?: boolean;
}

export class ScoringService {
  private readonly strategies: Record<ScoringMethod, Strategy> = {
    "GEMBA-DA": (req) => this.scoreGembaDa(req),
    "GEMBA-MQM": (req) => this.scoreGembaMqm(req),
    "GEMBA-ESA": (req) => this.scoreGembaEsa(req),
    "STRUCTURED-DA": (req) => this.scoreStructuredDa(req),
  };

  constructor(
    private readonly llm: LlmGateway,
    private readonly llmModelName: string,
    private readonly options: ScoringServiceOptions = {}
  ) {}

  /** Rejects only with ScoringServiceError (or a subclass). */
  async score(req: ScoreRequest): Promise<ScoreComputation> {
    const strategy: Strategy | undefined = Object.hasOwn(this.strategies, req.method)
      ? this.strategies[req.method]
      : undefined;
    if (!strategy) throw new UnsupportedMethodError(String(req.method));
    try {
      return await strategy(req);
    } catch (e) {
      if (e instanceof ScoringServiceError) throw e;
      if (e instanceof GatewayError) {
        throw new ScoringServiceError(e.message, "GATEWAY_ERROR", { cause: e });
      }
      throw new ScoringServiceError(e instanceof Error ? e.message : String(e), "SCORING_ERROR", { cause: e });
    }
  }

  private async scoreGembaDa(req: ScoreRequest): Promise<ScoreComputation> {
    const response = await this.complete([{ role: "user", content: gembaDaPrompt(req) }]);
    return this.computation(req.method, extractLastNumber(response), response);
  }

  private async scoreGembaMqm(req: ScoreRequest): Promise<ScoreComputation> {
    const parsed = await this.llm.parse(gembaMqmMessages(req), MqmEvalSchema);
    this.debugLog("[scoring] GEMBA-MQM parsed:", parsed);
    return this.computation(req.method, parsed.score, JSON.stringify(parsed), { rationale: parsed.analysis });
  }

  private async scoreGembaEsa(req: ScoreRequest): Promise<ScoreComputation> {
    const errorAnalysis = await this.complete([{ role: "user", content: gembaEsaErrorPrompt(req) }]);
    const scoreResponse = await this.complete([
      { role: "user", content: gembaEsaScoringPrompt(req, errorAnalysis) },
    ]);
    const combinedRaw = `Errors:\n${errorAnalysis}\n---\nScore:\n${scoreResponse}`;
    return this.computation(req.method, extractLastNumber(scoreResponse), combinedRaw);
  }

  private async scoreStructuredDa(req: ScoreRequest): Promise<ScoreComputation> {
    const parsed = await this.llm.parse(structuredDaMessages(req), StructuredDaSchema);
    this.debugLog("[scoring] STRUCTURED-DA parsed:", parsed);
    return this.computation(req.method, parsed.score, JSON.stringify(parsed), {
      adequacy: parsed.adequacy,
      fluency: parsed.fluency,
      rationale: parsed.rationale,
    });
  }

  private async complete(messages: ChatMessage[]): Promise<string> {
    this.debugLog("[scoring] prompt:", messages[messages.length - 1]?.content);
    const response = await this.llm.complete(messages);
    this.debugLog("[scoring] response:", response);
    return response;
  }

  private debugLog(...args: unknown[]): void {
    if (this.options.debug) console.log(...args);
  }

  private computation(
    method: ScoringMethod,
    score: number,
    rawResponse: string,
    extras: Partial<Pick<ScoreComputation, "adequacy" | "fluency" | "rationale">> = {}
  ): ScoreComputation {
    return {
      method,
      score,
      llmModel: this.llmModelName,
      rawResponse,
      adequacy: extras.adequacy ?? null,
      fluency: extras.fluency ?? null,
      rationale: extras.rationale ?? null,
    };
  }
}
