import { describe, it, expect } from "vitest";
import { createGateway } from "../index.js";
import { MockGateway } from "../mockGateway.js";
import { OpenAiGateway } from "../openAiGateway.js";
import { GatewayError } from "../types.js";
import { loadConfig } from "../../config.js";
import { MqmEvalSchema, StructuredDaSchema } from "../../scoring/schemas.js";

describe("createGateway", () => {
  it("returns the mock gateway for LLM_PROVIDER=mock", () => {
    expect(createGateway(loadConfig({ LLM_PROVIDER: "mock" }))).toBeInstanceOf(MockGateway);
  });

  it("builds an OpenAI gateway when a key is configured", () => {
    const gateway = createGateway(loadConfig({ LLM_PROVIDER: "openai", OPENAI_API_KEY: "test-secret" }));
    expect(gateway).toBeInstanceOf(OpenAiGateway);
  });

  it("requires Azure settings for the default provider", () => {
    expect(() => createGateway(loadConfig({}))).toThrow(
      "AZURE_OPENAI_DEPLOYMENT is required when LLM_PROVIDER=azure. Set it in your environment."
    );
  });

  it("requires an Anthropic key", () => {
    expect(() => createGateway(loadConfig({ LLM_PROVIDER: "anthropic" }))).toThrow(
      "ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic. Set it in your environment."
    );
  });
});

describe("MockGateway", () => {
  it("answers a direct-assessment prompt and records the call", async () => {
    const gateway = new MockGateway();
    const reply = await gateway.complete([{ role: "user", content: "Score the following translation from A to B" }]);
    expect(reply).toBe("98.5");
    expect(gateway.calls).toHaveLength(1);
    expect(gateway.calls[0].kind).toBe("complete");
  });

  it("returns the first stub output that matches the schema", async () => {
    const gateway = new MockGateway();
    await expect(gateway.parse([{ role: "user", content: "x" }], MqmEvalSchema)).resolves.toEqual({
      score: 95,
      analysis: "Stub MQM response",
    });
    await expect(gateway.parse([{ role: "user", content: "x" }], StructuredDaSchema)).resolves.toEqual({
      score: 93,
      adequacy: 4.5,
      fluency: 4,
      rationale: "Stub structured response",
    });
  });

  it("fails on the __FAIL__ trigger", async () => {
    const gateway = new MockGateway();
    await expect(gateway.complete([{ role: "user", content: "__FAIL__" }])).rejects.toBeInstanceOf(GatewayError);
    expect(gateway.calls).toHaveLength(1);
  });
});
