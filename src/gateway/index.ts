/**
 * Gateway factory: AzureOpenAI, OpenAI, Anthropic or the mock, per LLM_PROVIDER.
 */

import Anthropic from "@anthropic-ai/sdk";
import OpenAI, { AzureOpenAI } from "openai";
import type { AppConfig } from "../config.js";
import { AnthropicGateway } from "./anthropicGateway.js";
import { MockGateway } from "./mockGateway.js";
import { OpenAiGateway } from "./openAiGateway.js";
import type { LlmGateway } from "./types.js";

function required(value: string | undefined, name: string, provider: string): string {
  if (!value) {
    throw new Error(`${name} is required when LLM_PROVIDER=${provider}. Set it in your environment.`);
  }
  return value;
}

export function createGateway(config: AppConfig): LlmGateway {
  switch (config.llmProvider) {
    case "azure": {
      const deployment = required(config.azure.deployment, "AZURE_OPENAI_DEPLOYMENT", "azure");
      const client = new AzureOpenAI({
        endpoint: required(config.azure.endpoint, "AZURE_OPENAI_ENDPOINT", "azure"),
        apiKey: required(config.azure.apiKey, "AZURE_OPENAI_API_KEY", "azure"),
        apiVersion: config.azure.apiVersion,
        deployment,
      });
      return new OpenAiGateway(client, deployment);
    }
    case "openai": {
      const client = new OpenAI({ apiKey: required(config.openai.apiKey, "OPENAI_API_KEY", "openai") });
      return new OpenAiGateway(client, config.openai.model);
    }
    case "anthropic": {
      const client = new Anthropic({ apiKey: required(config.anthropic.apiKey, "ANTHROPIC_API_KEY", "anthropic") });
      return new AnthropicGateway(client, config.anthropic.model);
    }
    case "mock":
      return new MockGateway();
  }
}
