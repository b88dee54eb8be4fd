import { afterEach, describe, it, expect } from "vitest";
import { InvalidArgumentError, RetrievalDegradedError } from "@groundline/errors";
import { BagOfWordsEmbeddingProvider } from "@groundline/testing";
import type { RetrievedResult } from "@groundline/types";
import { InMemoryVectorIndex } from "@groundline/vector-index";
import type { IVectorIndex } from "@groundline/vector-index";
import { Retriever } from "./retrieval-pipeline.js";

function stubIndex(search: (query: string, k: number) => Promise<RetrievedResult[]>): IVectorIndex {
  return {
    size: 1,
    upsert: async () => 0,
    search,
    delete: async () => 0,
    clear: async () => undefined,
    has: () => false,
  };
}

describe("Retriever", () => {
  const retrievers: Retriever[] = [];

  function track(retriever: Retriever): Retriever {
    retrievers.push(retriever);
    return retriever;
  }

  afterEach(() => {
    for (const retriever of retrievers.splice(0)) retriever.shutdown();
  });

  it("returns ranked results from the index", async () => {
    const index = new InMemoryVectorIndex(new BagOfWordsEmbeddingProvider(["cat", "dog"]));
    await index.upsert([
      {
        id: "pets:0",
        documentId: "pets",
        text: "dog",
        offset: 0,
        length: 3,
        metadata: { source: "/pets.txt", filename: "pets.txt", fileType: "txt", index: 0 },
      },
    ]);
    const retriever = track(new Retriever(index, { timeoutMs: 1000 }));

    const results = await retriever.retrieve("dog", 3);
    expect(results.map((r) => r.chunk.id)).toEqual(["pets:0"]);
  });

  it("passes invalid arguments through without tripping the breaker", async () => {
    const index = new InMemoryVectorIndex(new BagOfWordsEmbeddingProvider(["cat"]));
    const retriever = track(new Retriever(index, { timeoutMs: 1000, volumeThreshold: 1 }));

    for (let i = 0; i < 3; i++) {
      await expect(retriever.retrieve("cat", 0)).rejects.toBeInstanceOf(InvalidArgumentError);
    }
    expect(retriever.isOpen).toBe(false);
  });

  it("wraps index failures and opens the circuit", async () => {
    const retriever = track(
      new Retriever(
        stubIndex(async () => {
          throw new Error("index down");
        }),
        { timeoutMs: 1000, volumeThreshold: 1, resetTimeoutMs: 60_000 },
      ),
    );

    await expect(retriever.retrieve("q", 1)).rejects.toThrow("retrieval failed: index down");
    expect(retriever.isOpen).toBe(true);
    await expect(retriever.retrieve("q", 1)).rejects.toThrow("retrieval failed: retrieval circuit open");
  });

  it("times out a slow search as degraded retrieval", async () => {
    const retriever = track(
      new Retriever(
        stubIndex(() => new Promise<RetrievedResult[]>(() => undefined)),
        { timeoutMs: 20 },
      ),
    );

    await expect(retriever.retrieve("q", 1)).rejects.toBeInstanceOf(RetrievalDegradedError);
  });
});
