import { afterEach, describe, it, expect, vi } from "vitest";
import { ExternalServiceError, InvalidArgumentError } from "@groundline/errors";
import type { EmbeddingsConfig } from "@groundline/types";
import { createEmbeddingProvider } from "./factory.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const EMBEDDINGS: EmbeddingsConfig = {
  provider: "cohere",
  cohereApiKey: "test-key",
  cohereModel: "embed-v4.0",
};

describe("createEmbeddingProvider", () => {
  it("creates a Cohere provider", () => {
    const provider = createEmbeddingProvider(EMBEDDINGS);
    expect(provider.name).toBe("cohere");
    expect(provider.dimensions).toBe(1024);
  });

  it("creates a BGE-M3 provider with custom dimensions", () => {
    const provider = createEmbeddingProvider(
      { ...EMBEDDINGS, provider: "bge-m3", bgeM3Url: "http://localhost:8080" },
      { dimensions: 768 },
    );
    expect(provider.name).toBe("bge-m3");
    expect(provider.dimensions).toBe(768);
  });

  it("rejects a selected provider that is missing its settings", () => {
    expect(() => createEmbeddingProvider({ ...EMBEDDINGS, cohereApiKey: "" })).toThrow(
      "COHERE_API_KEY is required for the cohere embedding provider",
    );
    expect(() => createEmbeddingProvider({ ...EMBEDDINGS, provider: "bge-m3" })).toThrow(
      InvalidArgumentError,
    );
  });
});

describe("BgeM3EmbeddingProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts texts to /embed and maps the response", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ embeddings: [[1, 0], [0, 1]], tokens_used: 7 }));
    vi.stubGlobal("fetch", fetchMock);

    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://bge.local/", dimensions: 2 });
    const result = await provider.batchEmbed(["alpha", "beta"]);

    expect(result).toEqual({
      embeddings: [
        [1, 0],
        [0, 1],
      ],
      model: "bge-m3",
      tokensUsed: 7,
      dimensions: 2,
    });
    expect(fetchMock).toHaveBeenCalledWith("http://bge.local/embed", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ texts: ["alpha", "beta"], dimensions: 2 }),
    });
  });

  it("raises ExternalServiceError on a non-2xx status", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("nope", { status: 503, statusText: "Service Unavailable" })),
    );
    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://bge.local" });

    await expect(provider.embed("query")).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(provider.embed("query")).rejects.toThrow(
      "BGE-M3 embedding failed: 503 Service Unavailable",
    );
  });

  it("rejects a malformed payload", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ vectors: [] })));
    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://bge.local" });

    await expect(provider.embed("query")).rejects.toThrow("BGE-M3 returned an unexpected payload");
  });

  it("reports health from the /health endpoint", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("ok", { status: 200 })));
    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://bge.local" });
    expect(await provider.healthCheck()).toBe(true);

    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );
    expect(await provider.healthCheck()).toBe(false);
  });
});
