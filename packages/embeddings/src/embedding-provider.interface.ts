import type { EmbeddingInputType, EmbeddingResult } from "@groundline/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  embed(text: string, inputType?: EmbeddingInputType): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], inputType?: EmbeddingInputType): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
