import { InvalidArgumentError } from "@groundline/errors";
import type { EmbeddingsConfig } from "@groundline/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";

/** Build the provider selected by `config.provider`. */
export function createEmbeddingProvider(
  config: EmbeddingsConfig,
  options: { dimensions?: number } = {},
): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (config.cohereApiKey.length === 0) {
        throw new InvalidArgumentError("COHERE_API_KEY is required for the cohere embedding provider");
      }
      return new CohereEmbeddingProvider({
        apiKey: config.cohereApiKey,
        model: config.cohereModel,
        ...options,
      });
    case "bge-m3":
      if (!config.bgeM3Url) {
        throw new InvalidArgumentError("BGE_M3_URL is required for the bge-m3 embedding provider");
      }
      return new BgeM3EmbeddingProvider({ baseUrl: config.bgeM3Url, ...options });
    default:
      throw new InvalidArgumentError(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
