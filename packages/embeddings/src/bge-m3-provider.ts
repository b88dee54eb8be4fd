import { ExternalServiceError } from "@groundline/errors";
import type { EmbeddingInputType, EmbeddingResult } from "@groundline/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 1024;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  dimensions?: number;
}

interface BgeM3Response {
  embeddings: number[][];
  tokens_used: number;
}

function isBgeM3Response(value: unknown): value is BgeM3Response {
  if (typeof value !== "object" || value === null) return false;
  if (!("embeddings" in value) || !("tokens_used" in value)) return false;
  return Array.isArray(value.embeddings) && typeof value.tokens_used === "number";
}

/**
 * BGE-M3 self-hosted embedding provider.
 * Communicates with a BGE-M3 model server via HTTP. BGE-M3 embeds queries and
 * documents the same way, so the input type is not forwarded.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly dimensions: number;
  private baseUrl: string;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, _inputType?: EmbeddingInputType): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[], _inputType?: EmbeddingInputType): Promise<EmbeddingResult> {
    const response = await fetch(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ texts, dimensions: this.dimensions }),
    });

    if (!response.ok) {
      throw new ExternalServiceError(
        `BGE-M3 embedding failed: ${String(response.status)} ${response.statusText}`,
        "bge-m3",
      );
    }

    const data: unknown = await response.json();
    if (!isBgeM3Response(data)) {
      throw new ExternalServiceError("BGE-M3 returned an unexpected payload", "bge-m3");
    }

    return {
      embeddings: data.embeddings,
      model: "bge-m3",
      tokensUsed: data.tokens_used,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
