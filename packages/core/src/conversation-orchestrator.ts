import { randomUUID } from "node:crypto";
import { Deadline, KeyedLock } from "@groundline/concurrency";
import {
  DeadlineExceededError,
  GenerationFailedError,
  errorMessage,
  withRetry,
} from "@groundline/errors";
import type { GuardrailsEngine } from "@groundline/guardrails";
import type { ILlmProvider } from "@groundline/llm";
import { createChildLogger, createSilentLogger } from "@groundline/logger";
import type { Logger } from "@groundline/logger";
import type { SessionStore } from "@groundline/session";
import type {
  BlockReason,
  ChatResponse,
  ChunkRef,
  GenerationOptions,
  GenerationResult,
  GuardrailViolation,
  Message,
  PromptFormat,
  RetrievedResult,
  SessionEventType,
} from "@groundline/types";
import { assembleContext } from "./context-assembler.js";
import { buildPrompt } from "./prompt-builder.js";
import type { Retriever } from "./retrieval-pipeline.js";
import { TurnStateMachine } from "./turn-state-machine.js";

export const BLOCK_MESSAGES: Readonly<Record<BlockReason, string>> = {
  input_policy: "Your message could not be processed because it violates the content policy.",
  output_policy: "The generated answer was withheld because it violates the content policy.",
  infrastructure: "The assistant is temporarily unavailable. Please try again.",
};

export interface OrchestratorConfig {
  topK: number;
  promptFormat: PromptFormat;
  generation: GenerationOptions;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  turnDeadlineMs: number;
}

export interface OrchestratorDependencies {
  guardrails: GuardrailsEngine;
  retriever: Retriever;
  llm: ILlmProvider;
  sessions: SessionStore;
  logger?: Logger;
  now?: () => number;
  newTurnId?: () => string;
}

interface TurnContext {
  userId: string;
  turnId: string;
  receivedAt: number;
  machine: TurnStateMachine;
  deadline: Deadline;
  logger: Logger;
}

/**
 * Runs one conversational turn:
 * input guardrails -> retrieval -> generation -> output guardrails -> persist.
 *
 * Turns for the same user run one at a time in arrival order. Every outcome,
 * including infrastructure failures, comes back as a ChatResponse.
 */
export class ConversationOrchestrator {
  private readonly locks = new KeyedLock();
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly newTurnId: () => string;

  constructor(
    private readonly deps: OrchestratorDependencies,
    private readonly config: OrchestratorConfig,
  ) {
    this.logger = createChildLogger(deps.logger ?? createSilentLogger(), {
      component: "orchestrator",
    });
    this.now = deps.now ?? Date.now;
    this.newTurnId = deps.newTurnId ?? randomUUID;
  }

  async chat(userId: string, query: string): Promise<ChatResponse> {
    const turnId = this.newTurnId();
    return this.locks.run(userId, async () => {
      const turn: TurnContext = {
        userId,
        turnId,
        receivedAt: this.now(),
        machine: new TurnStateMachine(),
        deadline: new Deadline(this.config.turnDeadlineMs, `turn ${turnId}`),
        logger: createChildLogger(this.logger, { userId, turnId }),
      };

      try {
        return await this.runTurn(turn, query);
      } catch (err: unknown) {
        // Nothing is persisted for an aborted turn.
        turn.machine.abort();
        if (err instanceof DeadlineExceededError) {
          turn.logger.warn({ err }, "Turn exceeded its deadline");
        } else {
          turn.logger.error({ err }, "Turn failed unexpectedly");
        }
        return this.blocked(turn, "infrastructure", []);
      } finally {
        turn.deadline.dispose();
        turn.logger.debug({ trace: turn.machine.trace }, "Turn finished");
      }
    });
  }

  private async runTurn(turn: TurnContext, query: string): Promise<ChatResponse> {
    const { machine, deadline } = turn;

    machine.transition("INPUT_VALIDATING");
    const input = await deadline.race(this.deps.guardrails.validate(query, "input"));
    if (input.blocked) {
      machine.transition("BLOCKED");
      await this.recordBlock(turn, "input_blocked", "input_policy", input.violations);
      return this.blocked(turn, "input_policy", input.violations);
    }

    machine.transition("RETRIEVING");
    const results = await this.retrieve(turn, input.sanitizedText);

    machine.transition("GENERATING");
    const history = await deadline.race(this.deps.sessions.asPromptContext(turn.userId));
    const prompt = buildPrompt({
      query: input.sanitizedText,
      context: assembleContext(results, this.config.promptFormat),
      history,
    });

    let generation: GenerationResult;
    try {
      generation = await this.generate(turn, prompt);
    } catch (err: unknown) {
      if (deadline.expired) throw err;
      turn.logger.warn({ err }, "Generation failed after retries");
      machine.transition("BLOCKED");
      await this.recordBlock(turn, "generation_failed", "infrastructure", []);
      return this.blocked(turn, "infrastructure", input.violations);
    }

    machine.transition("OUTPUT_VALIDATING");
    const output = await deadline.race(this.deps.guardrails.validate(generation.text, "output"));
    const violations = [...input.violations, ...output.violations];
    if (output.blocked) {
      machine.transition("BLOCKED");
      await this.recordBlock(turn, "output_blocked", "output_policy", output.violations);
      return this.blocked(turn, "output_policy", violations);
    }

    deadline.throwIfExpired();
    machine.transition("COMPLETED");

    const sources = results.map(({ chunk }) => chunk.id);
    const completedAt = Math.max(this.now(), turn.receivedAt);
    const messages: Message[] = [
      {
        id: `${turn.turnId}:user`,
        role: "user",
        content: input.sanitizedText,
        timestamp: turn.receivedAt,
        sources: [],
        redactionsApplied: input.sanitizedText !== query,
      },
      {
        id: `${turn.turnId}:assistant`,
        role: "assistant",
        content: output.sanitizedText,
        timestamp: completedAt,
        sources,
        redactionsApplied: output.sanitizedText !== generation.text,
      },
    ];
    await this.deps.sessions.appendAll(turn.userId, messages, { lastState: machine.state });

    return {
      turnId: turn.turnId,
      response: output.sanitizedText,
      sources: results.map(toChunkRef),
      blocked: false,
      violations,
      sessionBackend: this.deps.sessions.mode,
      state: machine.state,
    };
  }

  /** Retrieval failures other than the deadline degrade to an empty context. */
  private async retrieve(turn: TurnContext, query: string): Promise<RetrievedResult[]> {
    try {
      return await turn.deadline.race(this.deps.retriever.retrieve(query, this.config.topK));
    } catch (err: unknown) {
      if (err instanceof DeadlineExceededError) throw err;
      turn.logger.warn({ err }, "Retrieval degraded, answering without context");
      return [];
    }
  }

  private async generate(turn: TurnContext, prompt: string): Promise<GenerationResult> {
    const { deadline } = turn;
    let attempts = 0;
    try {
      return await deadline.race(
        withRetry(
          () => {
            attempts++;
            return this.deps.llm.generate(prompt, this.config.generation, deadline.signal);
          },
          {
            maxRetries: this.config.maxRetries,
            baseDelayMs: this.config.retryBaseDelayMs,
            maxDelayMs: this.config.retryMaxDelayMs,
            signal: deadline.signal,
            onRetry: (attempt, delayMs, error) => {
              turn.logger.warn(
                { attempt, delayMs, err: error, provider: this.deps.llm.name },
                "LLM call failed, retrying",
              );
            },
          },
        ),
      );
    } catch (err: unknown) {
      if (err instanceof DeadlineExceededError) throw err;
      throw new GenerationFailedError(`generation failed: ${errorMessage(err)}`, attempts, {
        cause: err,
      });
    }
  }

  private async recordBlock(
    turn: TurnContext,
    type: SessionEventType,
    reason: BlockReason,
    violations: GuardrailViolation[],
  ): Promise<void> {
    turn.logger.warn(
      { reason, ruleIds: violations.map((violation) => violation.ruleId) },
      "Turn blocked",
    );
    try {
      await this.deps.sessions.recordEvent(
        turn.userId,
        {
          type,
          turnId: turn.turnId,
          at: this.now(),
          reasonCode: reason,
          ruleIds: violations
            .filter((violation) => violation.severity === "high")
            .map((violation) => violation.ruleId),
        },
        { lastState: "BLOCKED" },
      );
    } catch (err: unknown) {
      turn.logger.warn({ err }, "Could not record block event");
    }
  }

  private blocked(
    turn: TurnContext,
    reason: BlockReason,
    violations: GuardrailViolation[],
  ): ChatResponse {
    return {
      turnId: turn.turnId,
      response: BLOCK_MESSAGES[reason],
      sources: [],
      blocked: true,
      reason,
      violations,
      sessionBackend: this.deps.sessions.mode,
      state: turn.machine.state,
    };
  }
}

function toChunkRef({ chunk, score }: RetrievedResult): ChunkRef {
  return {
    chunkId: chunk.id,
    documentId: chunk.documentId,
    filename: chunk.metadata.filename,
    score,
  };
}
