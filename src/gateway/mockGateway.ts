/**
 * Mock gateway for local runs and tests. Deterministic outputs keyed on prompt content;
 * every call is recorded in `calls`.
 * Trigger behaviors via message substrings:
 * - __FAIL__: rejects with GatewayError
 * - __NO_SCORE__: complete() returns text without any number
 */

import type { z } from "zod";
import { GatewayError, type ChatMessage, type LlmGateway } from "./types.js";

export interface MockGatewayCall {
  kind: "complete" | "parse";
  messages: ChatMessage[];
  temperature: number | undefined;
}

/** Candidate structured outputs; parse() returns the first one the requested schema accepts. */
const STRUCTURED_OUTPUTS: readonly unknown[] = [
  { score: 95, analysis: "Stub MQM response" },
  { score: 93, adequacy: 4.5, fluency: 4, rationale: "Stub structured response" },
];

function completionFor(prompt: string): string {
  if (prompt.includes("__NO_SCORE__")) return "The translation reads well.";
  if (prompt.includes("Annotated error spans")) return "Score (0-100): 87.0";
  if (prompt.includes("one of two categories")) return "no-error";
  if (prompt.includes("Score the following translation")) return "98.5";
  return "42";
}

export class MockGateway implements LlmGateway {
  readonly calls: MockGatewayCall[] = [];

  async complete(messages: readonly ChatMessage[], temperature?: number): Promise<string> {
    this.record("complete", messages, temperature);
    const last = messages[messages.length - 1]?.content ?? "";
    return completionFor(last);
  }

  async parse<T>(
    messages: readonly ChatMessage[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    temperature?: number
  ): Promise<T> {
    this.record("parse", messages, temperature);
    for (const candidate of STRUCTURED_OUTPUTS) {
      const result = schema.safeParse(candidate);
      if (result.success) return result.data;
    }
    throw new GatewayError("Mock gateway has no structured output matching the requested schema");
  }

  private record(kind: MockGatewayCall["kind"], messages: readonly ChatMessage[], temperature: number | undefined): void {
    this.calls.push({ kind, messages: [...messages], temperature });
    if (messages.some((m) => m.content.includes("__FAIL__"))) {
      throw new GatewayError("Forced failure for testing");
    }
  }
}
