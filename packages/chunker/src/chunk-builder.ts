import { basename } from "node:path";
import { InvalidArgumentError } from "@groundline/errors";
import type { Chunk, ChunkingOptions, Document } from "@groundline/types";

export function assertChunkingOptions({ chunkSize, overlap }: ChunkingOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidArgumentError(`chunkSize must be a positive integer, got ${String(chunkSize)}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new InvalidArgumentError(
      `overlap must be an integer in [0, chunkSize), got ${String(overlap)} for chunkSize ${String(chunkSize)}`,
    );
  }
}

/**
 * Chunk ids are derived from the document id and window index so that
 * re-ingesting a document replaces its chunks instead of adding new ones.
 */
export function chunkId(documentId: string, index: number): string {
  return `${documentId}:${String(index)}`;
}

export function buildChunk(document: Document, index: number, start: number, end: number): Chunk {
  return {
    id: chunkId(document.id, index),
    documentId: document.id,
    text: document.rawText.slice(start, end),
    offset: start,
    length: end - start,
    metadata: {
      source: document.sourcePath,
      filename: basename(document.sourcePath),
      fileType: document.fileType,
      index,
    },
  };
}
