import { KeyedLock } from "@groundline/concurrency";
import type { IEmbeddingProvider } from "@groundline/embeddings";
import {
  ExternalServiceError,
  InvalidArgumentError,
  RetrievalDegradedError,
  errorMessage,
} from "@groundline/errors";
import type { Chunk, RetrievedResult } from "@groundline/types";
import { cosineSimilarity } from "./cosine.js";
import type { IVectorIndex } from "./vector-index.interface.js";

interface IndexEntry {
  chunk: Chunk;
  vector: number[];
  /** Ingestion order; survives re-upserts of the same id. */
  seq: number;
}

/**
 * Brute-force cosine index held in process memory.
 *
 * Writes for a chunk id are serialized through a KeyedLock. A batch is embedded
 * first and then applied in a single synchronous pass, so a concurrent search
 * sees either none or all of it.
 */
export class InMemoryVectorIndex implements IVectorIndex {
  private readonly entries = new Map<string, IndexEntry>();
  private readonly locks = new KeyedLock();
  private nextSeq = 0;
  private dimensions: number | undefined;

  constructor(private readonly embeddingProvider: IEmbeddingProvider) {}

  get size(): number {
    return this.entries.size;
  }

  has(chunkId: string): boolean {
    return this.entries.has(chunkId);
  }

  async upsert(chunks: Chunk[]): Promise<number> {
    if (chunks.length === 0) return 0;

    return this.locks.runAll(
      chunks.map((chunk) => chunk.id),
      async () => {
        const result = await this.embeddingProvider.batchEmbed(
          chunks.map((chunk) => chunk.text),
          "search_document",
        );
        if (result.embeddings.length !== chunks.length) {
          throw new ExternalServiceError(
            `expected ${String(chunks.length)} embeddings, got ${String(result.embeddings.length)}`,
            this.embeddingProvider.name,
          );
        }

        const expected = this.dimensions ?? result.embeddings[0]?.length ?? 0;
        const staged = chunks.map((chunk, i) => {
          const vector = result.embeddings[i] ?? [];
          if (vector.length !== expected) {
            throw new InvalidArgumentError(
              `embedding has ${String(vector.length)} dimensions, index expects ${String(expected)}`,
            );
          }
          return { chunk, vector };
        });

        for (const { chunk, vector } of staged) {
          const existing = this.entries.get(chunk.id);
          this.entries.set(chunk.id, {
            chunk,
            vector,
            seq: existing?.seq ?? this.nextSeq++,
          });
        }
        this.dimensions = expected;
        return staged.length;
      },
    );
  }

  async search(queryText: string, k: number): Promise<RetrievedResult[]> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidArgumentError(`k must be a positive integer, got ${String(k)}`);
    }
    if (this.entries.size === 0) return [];

    let queryVector: number[] | undefined;
    try {
      const result = await this.embeddingProvider.embed(queryText, "search_query");
      queryVector = result.embeddings[0];
    } catch (err: unknown) {
      throw new RetrievalDegradedError(`query embedding failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!queryVector) {
      throw new RetrievalDegradedError("query embedding returned no vector");
    }
    const query = queryVector;

    const scored: (RetrievedResult & { seq: number })[] = [];
    for (const entry of this.entries.values()) {
      if (entry.vector.length !== query.length) {
        throw new RetrievalDegradedError(
          `query vector has ${String(query.length)} dimensions, index has ${String(entry.vector.length)}`,
        );
      }
      scored.push({
        chunk: entry.chunk,
        score: cosineSimilarity(query, entry.vector),
        seq: entry.seq,
      });
    }

    scored.sort((a, b) => b.score - a.score || a.seq - b.seq);
    return scored.slice(0, k).map(({ chunk, score }) => ({ chunk, score }));
  }

  async delete(chunkIds: string[]): Promise<number> {
    return this.locks.runAll(chunkIds, async () => {
      let removed = 0;
      for (const id of chunkIds) {
        if (this.entries.delete(id)) removed++;
      }
      if (this.entries.size === 0) this.dimensions = undefined;
      return removed;
    });
  }

  async clear(): Promise<void> {
    await this.locks.runAll([...this.entries.keys()], async () => {
      this.entries.clear();
      this.dimensions = undefined;
    });
  }
}
