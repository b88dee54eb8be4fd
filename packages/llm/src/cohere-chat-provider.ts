import { CohereClient } from "cohere-ai";
import { ExternalServiceError, errorMessage } from "@groundline/errors";
import type { GenerationOptions, GenerationResult } from "@groundline/types";
import type { ILlmProvider } from "./llm-provider.interface.js";

const DEFAULT_MODEL = "command-r-08-2024";

export interface CohereChatProviderConfig {
  apiKey: string;
  model?: string;
}

export class CohereChatProvider implements ILlmProvider {
  readonly name = "cohere";
  readonly model: string;
  private client: CohereClient;

  constructor(config: CohereChatProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async generate(
    prompt: string,
    options: GenerationOptions,
    signal?: AbortSignal,
  ): Promise<GenerationResult> {
    let text: string;
    try {
      // Retries belong to the caller's withRetry, not the SDK
      const response = await this.client.v2.chat(
        {
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          temperature: options.temperature,
          maxTokens: options.maxTokens,
        },
        { abortSignal: signal, maxRetries: 0 },
      );

      text = (response.message.content ?? [])
        .flatMap((item) => (item.type === "text" ? [item.text] : []))
        .join("");
    } catch (err: unknown) {
      throw new ExternalServiceError(`Cohere chat failed: ${errorMessage(err)}`, "cohere", {
        cause: err,
      });
    }

    if (text.trim().length === 0) {
      throw new ExternalServiceError("Cohere chat returned no text", "cohere");
    }

    return { text, model: this.model };
  }
}
