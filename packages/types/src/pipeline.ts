import type { Document } from "./document.js";

export type EmbeddingInputType = "search_document" | "search_query";

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface GenerationOptions {
  temperature: number;
  maxTokens: number;
}

export interface GenerationResult {
  text: string;
  model: string;
}

export interface IngestionRequest {
  documents: Document[];
  /** Clear the index before ingesting (full rebuild). */
  rebuild?: boolean;
}

export interface IngestionResult {
  documentCount: number;
  chunkCount: number;
  indexSize: number;
}
