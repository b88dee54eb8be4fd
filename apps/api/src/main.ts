import type { Server } from "node:http";
import { createChunker } from "@groundline/chunker";
import { parseEnv } from "@groundline/config";
import { ConversationOrchestrator, Retriever } from "@groundline/core";
import { createEmbeddingProvider } from "@groundline/embeddings";
import { createGuardrailsEngine } from "@groundline/guardrails";
import { createLlmProvider } from "@groundline/llm";
import { createLogger } from "@groundline/logger";
import { RedisSessionBackend, SessionStore } from "@groundline/session";
import { InMemoryVectorIndex } from "@groundline/vector-index";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ service: "groundline-api", level: config.logLevel });

  const embeddings = createEmbeddingProvider(config.embeddings);
  const index = new InMemoryVectorIndex(embeddings);
  const retriever = new Retriever(index, { timeoutMs: config.retrieval.timeoutMs, logger });

  const llm = createLlmProvider({
    provider: "cohere",
    cohere: { apiKey: config.llm.cohereApiKey, model: config.llm.model },
  });

  const sessions = await SessionStore.create({
    backend: new RedisSessionBackend({
      url: config.redis.url,
      commandTimeoutMs: config.session.backendTimeoutMs,
      logger,
    }),
    ttlSeconds: config.session.ttlSeconds,
    cacheMax: config.session.cacheMax,
    reprobeIntervalMs: config.session.reprobeIntervalMs,
    backendTimeoutMs: config.session.backendTimeoutMs,
    history: {
      maxMessages: config.session.historyMaxMessages,
      maxChars: config.session.historyMaxChars,
    },
    logger,
  });

  const orchestrator = new ConversationOrchestrator(
    {
      guardrails: createGuardrailsEngine(config.guardrails, { logger }),
      retriever,
      llm,
      sessions,
      logger,
    },
    {
      topK: config.retrieval.topK,
      promptFormat: config.retrieval.promptFormat,
      generation: { temperature: config.llm.temperature, maxTokens: config.llm.maxTokens },
      maxRetries: config.llm.maxRetries,
      retryBaseDelayMs: config.llm.retryBaseDelayMs,
      retryMaxDelayMs: config.llm.retryMaxDelayMs,
      turnDeadlineMs: config.turn.deadlineMs,
    },
  );

  const app = createApp({
    orchestrator,
    sessions,
    retriever,
    index,
    chunker: createChunker(config.chunking.strategy),
    chunking: { chunkSize: config.chunking.chunkSize, overlap: config.chunking.overlap },
    logger,
  });

  const server: Server = app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        sessionBackend: sessions.mode,
        embeddings: embeddings.name,
        guardrailProfile: config.guardrails.profile,
      },
      "API listening",
    );
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutting down");
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    retriever.shutdown();
    await sessions.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("[api] Fatal error:", err);
  process.exit(1);
});
