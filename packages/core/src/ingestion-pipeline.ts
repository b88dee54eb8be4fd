import type { IChunker } from "@groundline/chunker";
import { chunkId } from "@groundline/chunker";
import { createSilentLogger } from "@groundline/logger";
import type { Logger } from "@groundline/logger";
import type { ChunkingOptions, IngestionRequest, IngestionResult } from "@groundline/types";
import type { IVectorIndex } from "@groundline/vector-index";

export interface IngestionDependencies {
  chunker: IChunker;
  index: IVectorIndex;
  chunking: ChunkingOptions;
  logger?: Logger;
}

/**
 * Ingestion pipeline: Chunk -> Embed -> Store
 *
 * Chunk ids are `<documentId>:<index>`, so re-ingesting a document overwrites
 * its chunks; trailing chunks from a longer previous version are deleted.
 * `rebuild` clears the whole index first.
 */
export async function ingest(
  request: IngestionRequest,
  deps: IngestionDependencies,
): Promise<IngestionResult> {
  const logger = deps.logger ?? createSilentLogger();

  if (request.rebuild) {
    await deps.index.clear();
    logger.info("Vector index cleared for rebuild");
  }

  let chunkCount = 0;
  for (const document of request.documents) {
    const chunks = deps.chunker.split(document, deps.chunking);
    await deps.index.upsert(chunks);

    const stale: string[] = [];
    for (let i = chunks.length; deps.index.has(chunkId(document.id, i)); i++) {
      stale.push(chunkId(document.id, i));
    }
    if (stale.length > 0) {
      await deps.index.delete(stale);
    }

    chunkCount += chunks.length;
    logger.debug(
      { documentId: document.id, chunks: chunks.length, removed: stale.length },
      "Document ingested",
    );
  }

  return {
    documentCount: request.documents.length,
    chunkCount,
    indexSize: deps.index.size,
  };
}
