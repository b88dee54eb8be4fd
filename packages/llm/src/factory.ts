import type { ILlmProvider } from "./llm-provider.interface.js";
import { CohereChatProvider } from "./cohere-chat-provider.js";
import type { CohereChatProviderConfig } from "./cohere-chat-provider.js";

export interface LlmFactoryConfig {
  provider: "cohere";
  cohere?: CohereChatProviderConfig;
}

export function createLlmProvider(config: LlmFactoryConfig): ILlmProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      if (config.cohere.apiKey.length === 0) {
        throw new Error("Cohere API key must not be empty");
      }
      return new CohereChatProvider(config.cohere);
    default:
      throw new Error(`Unknown LLM provider: ${String(config.provider)}`);
  }
}
