import type { GuardrailViolation } from "./guardrails.js";
import type { SessionBackendMode } from "./session.js";

export type TurnState =
  | "RECEIVED"
  | "INPUT_VALIDATING"
  | "RETRIEVING"
  | "GENERATING"
  | "OUTPUT_VALIDATING"
  | "BLOCKED"
  | "COMPLETED";

export type BlockReason = "input_policy" | "output_policy" | "infrastructure";

export interface ChunkRef {
  chunkId: string;
  documentId: string;
  filename: string;
  score: number;
}

export interface ChatResponse {
  turnId: string;
  response: string;
  sources: ChunkRef[];
  blocked: boolean;
  reason?: BlockReason;
  violations: GuardrailViolation[];
  sessionBackend: SessionBackendMode;
  state: TurnState;
}
