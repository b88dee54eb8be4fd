import type { Chunk, RetrievedResult } from "@groundline/types";

export interface IVectorIndex {
  /** Number of stored chunks. */
  readonly size: number;

  /** Embed and store chunks. Re-upserting an id replaces it in place. */
  upsert(chunks: Chunk[]): Promise<number>;
  search(queryText: string, k: number): Promise<RetrievedResult[]>;
  delete(chunkIds: string[]): Promise<number>;
  clear(): Promise<void>;
  has(chunkId: string): boolean;
}
