import type { Chunk, ChunkStrategy, ChunkingOptions, Document } from "@groundline/types";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  split(document: Document, options: ChunkingOptions): Chunk[];
}
