import type { ChunkStrategy } from "@groundline/types";
import type { IChunker } from "./chunker.interface.js";
import { SlidingWindowChunker } from "./sliding-window-chunker.js";
import { RecursiveChunker } from "./recursive-chunker.js";

export function createChunker(strategy: ChunkStrategy): IChunker {
  switch (strategy) {
    case "sliding":
      return new SlidingWindowChunker();
    case "recursive":
      return new RecursiveChunker();
    default:
      throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
}
