/**
 * LLM gateway abstraction: "send chat messages, get text" and
 * "send chat messages, get a schema-validated object".
 */

import type { z } from "zod";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** Scoring is meant to be reproducible, so calls default to greedy decoding. */
export const DEFAULT_TEMPERATURE = 0;

export interface LlmGateway {
  /** Returns the trimmed text of the first choice. */
  complete(messages: readonly ChatMessage[], temperature?: number): Promise<string>;
  /** Returns the model's JSON output validated against `schema`. */
  parse<T>(
    messages: readonly ChatMessage[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    temperature?: number
  ): Promise<T>;
}

/** Transport, auth, quota or structured-output failure from the remote LLM service. */
export class GatewayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayError";
  }
}
