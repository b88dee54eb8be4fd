import { beforeEach, describe, it, expect } from "vitest";
import { SlidingWindowChunker } from "@groundline/chunker";
import { BagOfWordsEmbeddingProvider } from "@groundline/testing";
import type { Document } from "@groundline/types";
import { InMemoryVectorIndex } from "@groundline/vector-index";
import { ingest } from "./ingestion-pipeline.js";
import type { IngestionDependencies } from "./ingestion-pipeline.js";

function document(id: string, rawText: string): Document {
  return { id, sourcePath: `/docs/${id}.txt`, rawText, fileType: "txt" };
}

describe("ingest", () => {
  let index: InMemoryVectorIndex;
  let deps: IngestionDependencies;

  beforeEach(() => {
    index = new InMemoryVectorIndex(new BagOfWordsEmbeddingProvider(["cat", "dog", "fish", "bird"]));
    deps = { chunker: new SlidingWindowChunker(), index, chunking: { chunkSize: 10, overlap: 0 } };
  });

  it("chunks and indexes every document", async () => {
    // "cat dog fish bird" -> "cat dog fi" + "sh bird"
    const result = await ingest(
      { documents: [document("pets", "cat dog fish bird"), document("one", "cat")] },
      deps,
    );

    expect(result).toEqual({ documentCount: 2, chunkCount: 3, indexSize: 3 });
    expect(index.has("pets:0")).toBe(true);
    expect(index.has("pets:1")).toBe(true);
    expect(index.has("one:0")).toBe(true);
  });

  it("replaces a re-ingested document and drops its surplus chunks", async () => {
    await ingest({ documents: [document("pets", "cat dog fish bird")] }, deps);
    const result = await ingest({ documents: [document("pets", "dog")] }, deps);

    expect(result).toEqual({ documentCount: 1, chunkCount: 1, indexSize: 1 });
    expect(index.has("pets:1")).toBe(false);
    const [top] = await index.search("dog", 1);
    expect(top?.chunk.text).toBe("dog");
  });

  it("clears the index on rebuild", async () => {
    await ingest({ documents: [document("old", "cat")] }, deps);
    const result = await ingest({ documents: [document("new", "bird")], rebuild: true }, deps);

    expect(result.indexSize).toBe(1);
    expect(index.has("old:0")).toBe(false);
  });

  it("skips empty documents", async () => {
    const result = await ingest({ documents: [document("blank", "")] }, deps);
    expect(result).toEqual({ documentCount: 1, chunkCount: 0, indexSize: 0 });
  });
});
