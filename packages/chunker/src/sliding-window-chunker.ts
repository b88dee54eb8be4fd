import type { Chunk, ChunkingOptions, Document } from "@groundline/types";
import type { IChunker } from "./chunker.interface.js";
import { assertChunkingOptions, buildChunk } from "./chunk-builder.js";

/**
 * Fixed-length character windows advancing by `chunkSize - overlap`.
 * Windows cover the entire input; only the last one may be shorter.
 */
export class SlidingWindowChunker implements IChunker {
  readonly strategy = "sliding";

  split(document: Document, options: ChunkingOptions): Chunk[] {
    assertChunkingOptions(options);
    const { chunkSize, overlap } = options;
    const length = document.rawText.length;
    const results: Chunk[] = [];

    if (length === 0) {
      return results;
    }

    const step = chunkSize - overlap;

    for (let start = 0, index = 0; ; start += step, index++) {
      const end = Math.min(start + chunkSize, length);
      results.push(buildChunk(document, index, start, end));
      if (end === length) break;
    }

    return results;
  }
}
