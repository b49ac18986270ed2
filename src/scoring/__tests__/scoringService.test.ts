import { describe, it, expect, beforeEach } from "vitest";
import type { z } from "zod";
import { MockGateway } from "../../gateway/mockGateway.js";
import { parseStructuredOutput } from "../../gateway/structuredOutput.js";
import { GatewayError, type ChatMessage, type LlmGateway } from "../../gateway/types.js";
import { ParseError, ScoringServiceError, UnsupportedMethodError } from "../errors.js";
import { ScoringService, extractLastNumber } from "../scoringService.js";
import type { ScoreRequest, ScoringMethod } from "../types.js";

/** Replays canned replies in order; parse() runs them through the real structured-output path. */
class ScriptedGateway implements LlmGateway {
  readonly prompts: string[] = [];

  constructor(private readonly replies: string[]) {}

  async complete(messages: readonly ChatMessage[]): Promise<string> {
    this.prompts.push(messages[messages.length - 1]?.content ?? "");
    return this.next();
  }

  async parse<T>(messages: readonly ChatMessage[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    this.prompts.push(messages[messages.length - 1]?.content ?? "");
    return parseStructuredOutput(this.next(), schema);
  }

  private next(): string {
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("no scripted reply left");
    return reply;
  }
}

function request(method: ScoringMethod, overrides: Partial<ScoreRequest> = {}): ScoreRequest {
  return {
    sourceLang: "English",
    targetLang: "German",
    sourceText: "The cat sleeps.",
    targetText: "Die Katze schläft.",
    method,
    ...overrides,
  };
}

describe("extractLastNumber", () => {
  it("takes the last number in the reply", () => {
    expect(extractLastNumber("Reasoning... intermediate 12 steps... Score: 98.5")).toBe(98.5);
  });

  it("keeps sign and out-of-range values", () => {
    expect(extractLastNumber("-5")).toBe(-5);
    expect(extractLastNumber("Score: 105")).toBe(105);
  });

  it("throws ParseError when there is no number", () => {
    expect(() => extractLastNumber("no digits here")).toThrow(ParseError);
  });
});

describe("ScoringService with MockGateway", () => {
  let gateway: MockGateway;
  let service: ScoringService;

  beforeEach(() => {
    gateway = new MockGateway();
    service = new ScoringService(gateway, "test-model");
  });

  it("GEMBA-DA makes one completion and parses the number", async () => {
    const result = await service.score(request("GEMBA-DA"));
    expect(result).toEqual({
      method: "GEMBA-DA",
      score: 98.5,
      llmModel: "test-model",
      rawResponse: "98.5",
      adequacy: null,
      fluency: null,
      rationale: null,
    });
    expect(gateway.calls).toHaveLength(1);
    expect(gateway.calls[0].kind).toBe("complete");
  });

  it("GEMBA-MQM uses structured output and keeps the analysis", async () => {
    const result = await service.score(request("GEMBA-MQM"));
    expect(result.score).toBe(95);
    expect(result.rationale).toBe("Stub MQM response");
    expect(result.rawResponse).toBe('{"score":95,"analysis":"Stub MQM response"}');
    expect(gateway.calls).toHaveLength(1);
    expect(gateway.calls[0].kind).toBe("parse");
    expect(gateway.calls[0].messages).toHaveLength(4);
  });

  it("GEMBA-ESA runs two sequential completions", async () => {
    const result = await service.score(request("GEMBA-ESA"));
    expect(gateway.calls).toHaveLength(2);
    expect(gateway.calls[1].messages[0].content).toContain("Annotated error spans:\n```no-error```");
    expect(result.score).toBe(87);
    expect(result.rawResponse).toBe("Errors:\nno-error\n---\nScore:\nScore (0-100): 87.0");
    expect(result.adequacy).toBeNull();
  });

  it("STRUCTURED-DA returns adequacy, fluency and rationale", async () => {
    const result = await service.score(request("STRUCTURED-DA"));
    expect(result).toMatchObject({
      method: "STRUCTURED-DA",
      score: 93,
      adequacy: 4.5,
      fluency: 4,
      rationale: "Stub structured response",
    });
  });

  it("fails with PARSE_ERROR when the reply has no number", async () => {
    const err = await service.score(request("GEMBA-DA", { sourceText: "__NO_SCORE__" })).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ParseError);
    expect(err).toMatchObject({ code: "PARSE_ERROR" });
  });

  it("wraps gateway failures as GATEWAY_ERROR", async () => {
    const err = await service.score(request("GEMBA-MQM", { targetText: "__FAIL__" })).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ScoringServiceError);
    expect(err).toMatchObject({ code: "GATEWAY_ERROR", message: "Forced failure for testing" });
    expect(err instanceof Error && err.cause instanceof GatewayError).toBe(true);
  });

  it("rejects a method outside the enumeration without calling the gateway", async () => {
    const bogus: ScoreRequest = JSON.parse(
      '{"sourceLang":"English","targetLang":"German","sourceText":"a","targetText":"b","method":"BLEU"}'
    );
    await expect(service.score(bogus)).rejects.toThrow(UnsupportedMethodError);
    await expect(service.score(bogus)).rejects.toThrow("Unsupported scoring method: BLEU");
    expect(gateway.calls).toHaveLength(0);
  });
});

describe("ScoringService with scripted replies", () => {
  it("passes negative scores through unclamped", async () => {
    const service = new ScoringService(new ScriptedGateway(["-5"]), "test-model");
    await expect(service.score(request("GEMBA-DA"))).resolves.toMatchObject({ score: -5 });
  });

  it("feeds the first ESA reply verbatim into the second prompt", async () => {
    const gateway = new ScriptedGateway(["major: mistranslation at 'Katze'", "After review the score is 55"]);
    const result = await new ScoringService(gateway, "test-model").score(request("GEMBA-ESA"));
    expect(result.score).toBe(55);
    expect(gateway.prompts[1]).toContain("```major: mistranslation at 'Katze'```");
  });

  it("reports unparseable structured output as GATEWAY_ERROR", async () => {
    const service = new ScoringService(new ScriptedGateway(["not json"]), "test-model");
    await expect(service.score(request("GEMBA-MQM"))).rejects.toMatchObject({ code: "GATEWAY_ERROR" });
  });

  it("reports anything else as SCORING_ERROR", async () => {
    const service = new ScoringService(new ScriptedGateway([]), "test-model");
    await expect(service.score(request("GEMBA-DA"))).rejects.toMatchObject({
      code: "SCORING_ERROR",
      message: "no scripted reply left",
    });
  });
});
