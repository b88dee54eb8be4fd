export type MessageRole = "user" | "assistant";

export interface Message {
  id: string;
  role: MessageRole;
  content: string;
  /** Epoch milliseconds. */
  timestamp: number;
  /** Chunk ids the message was grounded on. */
  sources: string[];
  redactionsApplied: boolean;
}

export type SessionEventType = "input_blocked" | "output_blocked" | "generation_failed";

export interface SessionEvent {
  type: SessionEventType;
  turnId: string;
  at: number;
  reasonCode: string;
  ruleIds: string[];
}

export interface SessionMetadata {
  events: SessionEvent[];
  lastState?: string;
}

export interface Session {
  sessionId: string;
  userId: string;
  createdAt: number;
  lastActivityAt: number;
  ttlSeconds: number;
  /** Monotonic record version used for compare-and-set against the durable store. */
  version: number;
  messages: Message[];
  metadata: SessionMetadata;
}

export type SessionBackendMode = "durable" | "degraded";

export interface SessionStats {
  messageCount: number;
  createdAt: number;
  lastActivityAt: number;
  /** Seconds until the session expires if left idle. */
  ttlRemaining: number;
}

export interface SessionStoreOverview {
  mode: SessionBackendMode;
  localSessions: number;
  ttlSeconds: number;
}

/** Server figures a durable backend can report; absent when it has none. */
export interface DurableBackendInfo {
  memoryUsed?: string;
  connectedClients?: number;
}

export interface SessionStoreStats extends DurableBackendInfo {
  mode: SessionBackendMode;
  backend: string;
  /** Users with a live session, durable or buffered locally. */
  activeSessions: number;
  localSessions: number;
  ttlSeconds: number;
}
