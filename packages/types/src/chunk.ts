export type ChunkStrategy = "sliding" | "recursive";

export interface Chunk {
  id: string;
  documentId: string;
  text: string;
  /** Character offset of the window in the document's raw text. */
  offset: number;
  length: number;
  metadata: ChunkMetadata;
}

export interface ChunkMetadata {
  source: string;
  filename: string;
  fileType: string;
  index: number;
}

export interface ChunkingOptions {
  /** Window length in characters. */
  chunkSize: number;
  /** Characters shared by adjacent windows. Must satisfy 0 <= overlap < chunkSize. */
  overlap: number;
}

export interface RetrievedResult {
  chunk: Chunk;
  score: number;
}
