/**
 * OpenAI-compatible gateway using the official Chat Completions API.
 * Serves both api.openai.com (OpenAI) and Azure OpenAI deployments (AzureOpenAI).
 */

import type OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { z } from "zod";
import { parseStructuredOutput } from "./structuredOutput.js";
import { DEFAULT_TEMPERATURE, GatewayError, type ChatMessage, type LlmGateway } from "./types.js";

function toOpenAiMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

export class OpenAiGateway implements LlmGateway {
  /**
   * @param model Model name, or the deployment name for Azure.
   */
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async complete(messages: readonly ChatMessage[], temperature = DEFAULT_TEMPERATURE): Promise<string> {
    const content = await this.createCompletion(messages, temperature, false);
    return content.trim();
  }

  async parse<T>(
    messages: readonly ChatMessage[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    temperature = DEFAULT_TEMPERATURE
  ): Promise<T> {
    const content = await this.createCompletion(messages, temperature, true);
    return parseStructuredOutput(content, schema);
  }

  private async createCompletion(
    messages: readonly ChatMessage[],
    temperature: number,
    jsonMode: boolean
  ): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: messages.map(toOpenAiMessage),
        temperature,
        ...(jsonMode ? { response_format: { type: "json_object" as const } } : {}),
      });
      return response.choices[0]?.message?.content ?? "";
    } catch (error) {
      throw new GatewayError(
        `OpenAI chat completion failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
