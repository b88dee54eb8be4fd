import express from "express";
import type { Express } from "express";
import type { IChunker } from "@groundline/chunker";
import { ingest } from "@groundline/core";
import type { ConversationOrchestrator, Retriever } from "@groundline/core";
import { NotFoundError } from "@groundline/errors";
import { createChildLogger, createSilentLogger } from "@groundline/logger";
import type { Logger } from "@groundline/logger";
import type { SessionStore } from "@groundline/session";
import type { ChunkingOptions, Document } from "@groundline/types";
import type { IVectorIndex } from "@groundline/vector-index";
import {
  asyncHandler,
  errorHandler,
  notFound,
  requestId,
  requestLogger,
  sendData,
} from "./middleware.js";
import {
  chatRequestSchema,
  fileTypeOf,
  historyQuerySchema,
  ingestRequestSchema,
  parseOrThrow,
  userParamsSchema,
} from "./schemas.js";

export interface ApiDependencies {
  orchestrator: ConversationOrchestrator;
  sessions: SessionStore;
  retriever: Retriever;
  index: IVectorIndex;
  chunker: IChunker;
  chunking: ChunkingOptions;
  logger?: Logger;
  /** Upper bound for JSON request bodies, in express' size syntax. */
  bodyLimit?: string;
}

export function createApp(deps: ApiDependencies): Express {
  const logger = createChildLogger(deps.logger ?? createSilentLogger(), { component: "http" });
  const app = express();

  app.disable("x-powered-by");
  app.use(requestId());
  app.use(requestLogger(logger));
  app.use(express.json({ limit: deps.bodyLimit ?? "5mb" }));

  app.get("/health", (_req, res) => {
    sendData(res, 200, {
      status: "ok",
      sessionBackend: deps.sessions.mode,
      retrievalCircuit: deps.retriever.isOpen ? "open" : "closed",
      indexSize: deps.index.size,
    });
  });

  app.post(
    "/v1/chat",
    asyncHandler(async (req, res) => {
      const { userId, message } = parseOrThrow(chatRequestSchema, req.body, "chat request");
      const response = await deps.orchestrator.chat(userId, message);
      sendData(res, 200, response);
    }),
  );

  app.get(
    "/v1/sessions",
    asyncHandler(async (_req, res) => {
      const userIds = await deps.sessions.activeSessions();
      const stats = await deps.sessions.storeStats();
      sendData(res, 200, { userIds, stats });
    }),
  );

  app.get(
    "/v1/sessions/:userId",
    asyncHandler(async (req, res) => {
      const { userId } = parseOrThrow(userParamsSchema, req.params, "path");
      const stats = await deps.sessions.stats(userId);
      if (!stats) {
        throw new NotFoundError(`No active session for user ${userId}`);
      }
      sendData(res, 200, { userId, ...stats, sessionBackend: deps.sessions.mode });
    }),
  );

  app.get(
    "/v1/sessions/:userId/history",
    asyncHandler(async (req, res) => {
      const { userId } = parseOrThrow(userParamsSchema, req.params, "path");
      const { limit } = parseOrThrow(historyQuerySchema, req.query, "query");
      const messages = await deps.sessions.history(userId, limit);
      sendData(res, 200, { userId, messages });
    }),
  );

  app.delete(
    "/v1/sessions/:userId",
    asyncHandler(async (req, res) => {
      const { userId } = parseOrThrow(userParamsSchema, req.params, "path");
      await deps.sessions.expire(userId);
      sendData(res, 200, { userId, expired: true });
    }),
  );

  app.post(
    "/v1/documents",
    asyncHandler(async (req, res) => {
      const body = parseOrThrow(ingestRequestSchema, req.body, "ingestion request");
      const documents: Document[] = body.documents.map((document) => ({
        id: document.id,
        sourcePath: document.sourcePath,
        rawText: document.rawText,
        fileType: document.fileType ?? fileTypeOf(document.sourcePath),
      }));
      const result = await ingest(
        { documents, rebuild: body.rebuild },
        { chunker: deps.chunker, index: deps.index, chunking: deps.chunking, logger },
      );
      logger.info({ ...result, rebuild: body.rebuild }, "Documents ingested");
      sendData(res, 201, result);
    }),
  );

  app.use(notFound());
  app.use(errorHandler(logger));

  return app;
}
