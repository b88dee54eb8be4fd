import { z } from "zod";
import type { AppConfig, RuleName, RuleToggles } from "@groundline/types";
import { RULE_NAMES, getEffectiveRules, getProfileDefaults } from "./guardrail-profiles.js";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

const ruleList = z
  .string()
  .default("")
  .transform((val) =>
    val
      .split(",")
      .map((rule) => rule.trim())
      .filter((rule) => rule.length > 0),
  )
  .pipe(z.array(z.enum(RULE_NAMES)));

/**
 * Zod schema for all environment variables defined in .env.example.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    PORT: positiveInt("3000"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Redis ----------
    REDIS_URL: z
      .string()
      .default("redis://localhost:6379")
      .refine((url) => url.startsWith("redis://") || url.startsWith("rediss://"), {
        message: "REDIS_URL must start with redis:// or rediss://",
      }),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    BGE_M3_URL: z.string().url().optional(),

    // ---------- Generation ----------
    COHERE_CHAT_MODEL: z.string().default("command-r-08-2024"),
    TEMPERATURE: z.string().default("0.7").transform(Number).pipe(z.number().min(0).max(2)),
    MAX_TOKENS: positiveInt("1000"),
    LLM_MAX_RETRIES: nonNegativeInt("1"),
    LLM_RETRY_BASE_DELAY_MS: nonNegativeInt("500"),
    LLM_RETRY_MAX_DELAY_MS: nonNegativeInt("2000"),

    // ---------- Chunking & retrieval ----------
    CHUNK_STRATEGY: z.enum(["sliding", "recursive"]).default("sliding"),
    CHUNK_SIZE: positiveInt("1000"),
    CHUNK_OVERLAP: nonNegativeInt("200"),
    TOP_K: positiveInt("5"),
    RETRIEVAL_TIMEOUT_MS: positiveInt("5000"),
    PROMPT_FORMAT: z.enum(["plain", "markdown", "xml"]).default("plain"),

    // ---------- Guardrails ----------
    GUARDRAIL_PROFILE: z.enum(["strict", "standard", "permissive"]).default("standard"),
    GUARDRAIL_RULES_ENABLED: ruleList,
    GUARDRAIL_RULES_DISABLED: ruleList,
    MAX_INPUT_LENGTH: positiveInt("2000"),
    MAX_OUTPUT_LENGTH: positiveInt("2000"),
    TOXICITY_THRESHOLD: z.string().default("0.5").transform(Number).pipe(z.number().min(0).max(1)),

    // ---------- Sessions ----------
    SESSION_TTL_SECONDS: positiveInt("3600"),
    SESSION_CACHE_MAX: positiveInt("10000"),
    SESSION_REPROBE_INTERVAL_MS: nonNegativeInt("0"),
    SESSION_BACKEND_TIMEOUT_MS: positiveInt("1000"),
    HISTORY_MAX_MESSAGES: nonNegativeInt("6"),
    HISTORY_MAX_CHARS: nonNegativeInt("2000"),

    // ---------- Turn ----------
    TURN_DEADLINE_MS: positiveInt("30000"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.EMBEDDING_PROVIDER === "bge-m3" && !env.BGE_M3_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
      });
    }
    const both = env.GUARDRAIL_RULES_ENABLED.filter((rule) =>
      env.GUARDRAIL_RULES_DISABLED.includes(rule),
    );
    if (both.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GUARDRAIL_RULES_DISABLED"],
        message: `Rules both enabled and disabled: ${both.join(", ")}`,
      });
    }
  });

function toOverrides(enabled: RuleName[], disabled: RuleName[]): Partial<RuleToggles> {
  const overrides: Partial<RuleToggles> = {};
  for (const rule of enabled) overrides[rule] = true;
  for (const rule of disabled) overrides[rule] = false;
  return overrides;
}

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const profile = getProfileDefaults(parsed.GUARDRAIL_PROFILE);
  const cohereApiKey = parsed.COHERE_API_KEY ?? "";

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,

    redis: {
      url: parsed.REDIS_URL,
    },

    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      cohereApiKey,
      cohereModel: parsed.COHERE_EMBED_MODEL,
      bgeM3Url: parsed.BGE_M3_URL,
    },

    llm: {
      cohereApiKey,
      model: parsed.COHERE_CHAT_MODEL,
      temperature: parsed.TEMPERATURE,
      maxTokens: parsed.MAX_TOKENS,
      maxRetries: parsed.LLM_MAX_RETRIES,
      retryBaseDelayMs: parsed.LLM_RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: parsed.LLM_RETRY_MAX_DELAY_MS,
    },

    chunking: {
      strategy: parsed.CHUNK_STRATEGY,
      chunkSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },

    retrieval: {
      topK: parsed.TOP_K,
      timeoutMs: parsed.RETRIEVAL_TIMEOUT_MS,
      promptFormat: parsed.PROMPT_FORMAT,
    },

    guardrails: {
      profile: parsed.GUARDRAIL_PROFILE,
      rules: getEffectiveRules(
        parsed.GUARDRAIL_PROFILE,
        toOverrides(parsed.GUARDRAIL_RULES_ENABLED, parsed.GUARDRAIL_RULES_DISABLED),
      ),
      maxInputLength: parsed.MAX_INPUT_LENGTH,
      maxOutputLength: parsed.MAX_OUTPUT_LENGTH,
      inputPiiSeverity: profile.inputPiiSeverity,
      outputPiiSeverity: profile.outputPiiSeverity,
      toxicityThreshold: parsed.TOXICITY_THRESHOLD,
    },

    session: {
      ttlSeconds: parsed.SESSION_TTL_SECONDS,
      cacheMax: parsed.SESSION_CACHE_MAX,
      reprobeIntervalMs: parsed.SESSION_REPROBE_INTERVAL_MS,
      backendTimeoutMs: parsed.SESSION_BACKEND_TIMEOUT_MS,
      historyMaxMessages: parsed.HISTORY_MAX_MESSAGES,
      historyMaxChars: parsed.HISTORY_MAX_CHARS,
    },

    turn: {
      deadlineMs: parsed.TURN_DEADLINE_MS,
    },
  };
}
