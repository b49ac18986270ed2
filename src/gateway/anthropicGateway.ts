/**
 * Anthropic gateway using the Messages API.
 * System messages are folded into the top-level `system` field; structured output is prompted.
 */

import type Anthropic from "@anthropic-ai/sdk";
import type { z } from "zod";
import { JSON_ONLY_INSTRUCTION, parseStructuredOutput } from "./structuredOutput.js";
import { DEFAULT_TEMPERATURE, GatewayError, type ChatMessage, type LlmGateway } from "./types.js";

const MAX_TOKENS = 1500;

export class AnthropicGateway implements LlmGateway {
  constructor(
    private readonly client: Anthropic,
    private readonly model: string
  ) {}

  async complete(messages: readonly ChatMessage[], temperature = DEFAULT_TEMPERATURE): Promise<string> {
    const text = await this.createMessage(messages, temperature, []);
    return text.trim();
  }

  async parse<T>(
    messages: readonly ChatMessage[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    temperature = DEFAULT_TEMPERATURE
  ): Promise<T> {
    const text = await this.createMessage(messages, temperature, [JSON_ONLY_INSTRUCTION]);
    return parseStructuredOutput(text, schema);
  }

  private async createMessage(
    messages: readonly ChatMessage[],
    temperature: number,
    extraSystem: string[]
  ): Promise<string> {
    const system = [...messages.filter((m) => m.role === "system").map((m) => m.content), ...extraSystem].join("\n\n");
    const turns = messages
      .filter((m) => m.role !== "system")
      .map((m) => ({ role: m.role === "assistant" ? ("assistant" as const) : ("user" as const), content: m.content }));
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: MAX_TOKENS,
        temperature,
        messages: turns,
        ...(system ? { system } : {}),
      });
      return (
        response.content
          ?.filter((block) => block.type === "text")
          .map((block) => ("text" in block ? block.text : ""))
          .join("") ?? ""
      );
    } catch (error) {
      throw new GatewayError(
        `Anthropic message request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
