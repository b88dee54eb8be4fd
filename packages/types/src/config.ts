import type { ChunkStrategy } from "./chunk.js";
import type { RuleToggles, Severity } from "./guardrails.js";

export type GuardrailProfile = "strict" | "standard" | "permissive";

export type PromptFormat = "plain" | "markdown" | "xml";

export type EmbeddingProviderName = "cohere" | "bge-m3";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  redis: RedisConfig;
  embeddings: EmbeddingsConfig;
  llm: LlmConfig;
  chunking: ChunkingConfig;
  retrieval: RetrievalConfig;
  guardrails: GuardrailsConfig;
  session: SessionConfig;
  turn: TurnConfig;
}

export interface RedisConfig {
  url: string;
}

export interface EmbeddingsConfig {
  provider: EmbeddingProviderName;
  cohereApiKey: string;
  cohereModel: string;
  bgeM3Url?: string;
}

export interface LlmConfig {
  cohereApiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export interface ChunkingConfig {
  strategy: ChunkStrategy;
  chunkSize: number;
  overlap: number;
}

export interface RetrievalConfig {
  topK: number;
  timeoutMs: number;
  promptFormat: PromptFormat;
}

export interface GuardrailsConfig {
  profile: GuardrailProfile;
  rules: RuleToggles;
  maxInputLength: number;
  maxOutputLength: number;
  inputPiiSeverity: Severity;
  outputPiiSeverity: Severity;
  toxicityThreshold: number;
}

export interface SessionConfig {
  ttlSeconds: number;
  cacheMax: number;
  reprobeIntervalMs: number;
  backendTimeoutMs: number;
  historyMaxMessages: number;
  historyMaxChars: number;
}

export interface TurnConfig {
  deadlineMs: number;
}
