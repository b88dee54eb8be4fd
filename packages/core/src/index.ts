export { ingest } from "./ingestion-pipeline.js";
export type { IngestionDependencies } from "./ingestion-pipeline.js";

export { Retriever } from "./retrieval-pipeline.js";
export type { RetrieverOptions } from "./retrieval-pipeline.js";

export { assembleContext } from "./context-assembler.js";
export { buildPrompt, SYSTEM_INSTRUCTIONS, NO_CONTEXT } from "./prompt-builder.js";
export type { PromptParts } from "./prompt-builder.js";

export { TurnStateMachine, IllegalTransitionError } from "./turn-state-machine.js";
export { ConversationOrchestrator, BLOCK_MESSAGES } from "./conversation-orchestrator.js";
export type {
  OrchestratorConfig,
  OrchestratorDependencies,
} from "./conversation-orchestrator.js";
