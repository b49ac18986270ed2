import { describe, it, expect } from "vitest";
import {
  MQM_FEW_SHOT_ASSISTANT,
  STRUCTURED_DA_SYSTEM_PROMPT,
  gembaDaPrompt,
  gembaEsaErrorPrompt,
  gembaEsaScoringPrompt,
  gembaMqmMessages,
  structuredDaMessages,
} from "../prompts.js";
import type { ScoreRequest } from "../types.js";

const REQ: ScoreRequest = {
  sourceLang: "English",
  targetLang: "German",
  sourceText: "The cat sleeps.",
  targetText: "Die Katze schläft.",
  method: "GEMBA-DA",
};

describe("gembaDaPrompt", () => {
  it("quotes both texts and ends with the score cue", () => {
    const prompt = gembaDaPrompt(REQ);
    expect(prompt.startsWith("Score the following translation from English to German")).toBe(true);
    expect(prompt).toContain('English source: "The cat sleeps."');
    expect(prompt).toContain('German translation: "Die Katze schläft."');
    expect(prompt.endsWith("Score:")).toBe(true);
  });

  it("is deterministic and embeds texts verbatim", () => {
    const req = { ...REQ, sourceText: 'He said "hi" {x} ```' };
    expect(gembaDaPrompt(req)).toBe(gembaDaPrompt(req));
    expect(gembaDaPrompt(req)).toContain('He said "hi" {x} ```');
  });
});

describe("gembaMqmMessages", () => {
  it("is system, one-shot exchange, then the request", () => {
    const messages = gembaMqmMessages(REQ);
    expect(messages.map((m) => m.role)).toEqual(["system", "user", "assistant", "user"]);
    expect(messages[2].content).toBe(MQM_FEW_SHOT_ASSISTANT);
    expect(messages[3].content).toContain(
      "English source:\n```The cat sleeps.```\nGerman translation:\n```Die Katze schläft.```"
    );
    expect(messages[3].content).toContain("critical, major, and minor");
  });
});

describe("GEMBA-ESA prompts", () => {
  it("asks for major/minor error spans first", () => {
    expect(gembaEsaErrorPrompt(REQ)).toContain("one of two categories: major or minor");
  });

  it("embeds the error analysis verbatim in the scoring prompt", () => {
    const prompt = gembaEsaScoringPrompt(REQ, "minor: grammar");
    expect(prompt).toContain("Annotated error spans:\n```minor: grammar```");
    expect(prompt).toContain("Score the following translation from English source:");
    expect(prompt.endsWith("Score (0-100):")).toBe(true);
  });
});

describe("structuredDaMessages", () => {
  it("pairs the evaluator persona with the JSON-only request", () => {
    const [system, user] = structuredDaMessages(REQ);
    expect(system).toEqual({ role: "system", content: STRUCTURED_DA_SYSTEM_PROMPT });
    expect(user.role).toBe("user");
    expect(user.content).toContain("German hypothesis: Die Katze schläft.");
    expect(user.content.endsWith("IMPORTANT: Output valid JSON only, no markdown fences or extra text.")).toBe(true);
  });
});
