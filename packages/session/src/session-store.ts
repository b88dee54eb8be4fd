import { randomUUID } from "node:crypto";
import { LRUCache } from "lru-cache";
import { Deadline, KeyedLock } from "@groundline/concurrency";
import { ConflictError, InvalidArgumentError } from "@groundline/errors";
import { createSilentLogger } from "@groundline/logger";
import type { Logger } from "@groundline/logger";
import type {
  DurableBackendInfo,
  Message,
  Session,
  SessionBackendMode,
  SessionEvent,
  SessionStats,
  SessionStoreOverview,
  SessionStoreStats,
} from "@groundline/types";
import type { DurableSessionBackend } from "./durable-backend.js";
import { formatHistory } from "./history.js";
import type { HistoryBudget } from "./history.js";
import { MAX_SESSION_EVENTS, appendMessages, mergeSessions } from "./merge.js";

const DEFAULT_CACHE_MAX = 10_000;
const DEFAULT_CAS_RETRIES = 3;
const DEFAULT_BACKEND_TIMEOUT_MS = 1_000;

export interface SessionStoreOptions {
  backend: DurableSessionBackend;
  ttlSeconds: number;
  cacheMax?: number;
  /** Minimum gap between re-probes while degraded. */
  reprobeIntervalMs?: number;
  /** Upper bound on any single durable call; a slower call counts as a failure. */
  backendTimeoutMs?: number;
  history?: HistoryBudget;
  maxCasRetries?: number;
  logger?: Logger;
  now?: () => number;
}

export interface WriteOptions {
  /** Final state of the turn that produced this write. */
  lastState?: string;
}

type Mutation = (session: Session) => Session;

/**
 * Conversation sessions keyed by user id.
 *
 * Every write lands in the local LRU cache first and is then applied to the
 * durable record with compare-and-set. A failed or stalled durable call never
 * fails the caller: the store switches to `degraded`, keeps serving from the
 * cache, and re-probes on later writes.
 *
 * A local copy holding writes the durable store never saw is merged into the
 * durable record once it is reachable again. A local copy that was fully
 * persisted is only a cache: if the durable record has since been expired or
 * replaced, the write is applied to the durable state instead.
 */
export class SessionStore {
  private readonly backend: DurableSessionBackend;
  private readonly ttlSeconds: number;
  private readonly reprobeIntervalMs: number;
  private readonly backendTimeoutMs: number;
  private readonly historyBudget: HistoryBudget;
  private readonly maxCasRetries: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly cache: LRUCache<string, Session>;
  private readonly locks = new KeyedLock();
  private currentMode: SessionBackendMode = "degraded";
  /** Users expired while the durable store was unreachable. */
  private readonly pendingDeletes = new Set<string>();
  /** Session ids with local writes the durable store has not accepted. */
  private readonly unsynced = new Set<string>();
  private lastProbeAt = Number.NEGATIVE_INFINITY;

  private constructor(options: SessionStoreOptions) {
    if (!Number.isInteger(options.ttlSeconds) || options.ttlSeconds <= 0) {
      throw new InvalidArgumentError("ttlSeconds must be a positive integer");
    }
    this.backend = options.backend;
    this.ttlSeconds = options.ttlSeconds;
    this.reprobeIntervalMs = options.reprobeIntervalMs ?? 0;
    this.backendTimeoutMs = options.backendTimeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS;
    this.historyBudget = options.history ?? { maxMessages: 6, maxChars: 2000 };
    this.maxCasRetries = options.maxCasRetries ?? DEFAULT_CAS_RETRIES;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;
    this.cache = new LRUCache<string, Session>({ max: options.cacheMax ?? DEFAULT_CACHE_MAX });
  }

  /** Build a store and probe the durable backend once to pick the starting mode. */
  static async create(options: SessionStoreOptions): Promise<SessionStore> {
    const store = new SessionStore(options);
    await store.probe();
    return store;
  }

  get mode(): SessionBackendMode {
    return this.currentMode;
  }

  overview(): SessionStoreOverview {
    return { mode: this.currentMode, localSessions: this.cache.size, ttlSeconds: this.ttlSeconds };
  }

  async probe(): Promise<SessionBackendMode> {
    this.lastProbeAt = this.now();
    try {
      await this.durable("ping", () => this.backend.ping());
      this.transition("durable");
    } catch (err: unknown) {
      this.transition("degraded", err);
    }
    return this.currentMode;
  }

  /** Current session, created if absent or expired. Refreshes its TTL. */
  async get(userId: string): Promise<Session> {
    return this.write(userId, (session) => ({ ...session, lastActivityAt: this.now() }));
  }

  async append(userId: string, message: Message, options: WriteOptions = {}): Promise<Session> {
    return this.appendAll(userId, [message], options);
  }

  /** Append several messages in one write. Ids already present are skipped. */
  async appendAll(
    userId: string,
    messages: readonly Message[],
    options: WriteOptions = {},
  ): Promise<Session> {
    return this.write(userId, (session) => ({
      ...session,
      lastActivityAt: this.now(),
      messages: appendMessages(session.messages, messages),
      metadata: withLastState(session.metadata, options.lastState),
    }));
  }

  async recordEvent(userId: string, event: SessionEvent, options: WriteOptions = {}): Promise<Session> {
    return this.write(userId, (session) => ({
      ...session,
      lastActivityAt: this.now(),
      metadata: withLastState(
        { ...session.metadata, events: [...session.metadata.events, event].slice(-MAX_SESSION_EVENTS) },
        options.lastState,
      ),
    }));
  }

  /** Stored messages, oldest first; the last `limit` when given. Never creates a session. */
  async history(userId: string, limit?: number): Promise<Message[]> {
    if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
      throw new InvalidArgumentError(`limit must be a positive integer, got ${String(limit)}`);
    }
    const session = await this.locks.run(userId, () => this.peek(userId));
    if (!session) return [];
    const messages = limit === undefined ? session.messages : session.messages.slice(-limit);
    return structuredClone(messages);
  }

  async asPromptContext(userId: string): Promise<string> {
    return formatHistory(await this.history(userId), this.historyBudget);
  }

  async expire(userId: string): Promise<void> {
    await this.locks.run(userId, async () => {
      const cached = this.cache.get(userId);
      if (cached) this.unsynced.delete(cached.sessionId);
      this.cache.delete(userId);
      this.pendingDeletes.add(userId);
      if (this.currentMode === "degraded" && !(await this.reprobe())) return;
      try {
        await this.flushPendingDelete(userId);
      } catch (err: unknown) {
        this.transition("degraded", err);
      }
    });
  }

  /** Null when the user has no live session. */
  async stats(userId: string): Promise<SessionStats | null> {
    const session = await this.locks.run(userId, () => this.peek(userId));
    if (!session) return null;
    const expiresAt = session.lastActivityAt + session.ttlSeconds * 1000;
    return {
      messageCount: session.messages.length,
      createdAt: session.createdAt,
      lastActivityAt: session.lastActivityAt,
      ttlRemaining: Math.max(0, Math.ceil((expiresAt - this.now()) / 1000)),
    };
  }

  /**
   * User ids with a live session, sorted. Durable records and local copies are
   * both counted; while degraded only the local cache is visible.
   */
  async activeSessions(): Promise<string[]> {
    const ids = new Set(this.localUserIds());
    if (this.currentMode === "durable") {
      try {
        for (const userId of await this.durable("scan", () => this.backend.activeUserIds())) {
          if (!this.pendingDeletes.has(userId)) ids.add(userId);
        }
      } catch (err: unknown) {
        this.transition("degraded", err);
      }
    }
    return [...ids].sort();
  }

  async storeStats(): Promise<SessionStoreStats> {
    const active = await this.activeSessions();
    let info: DurableBackendInfo = {};
    if (this.currentMode === "durable") {
      try {
        info = await this.durable("info", () => this.backend.info());
      } catch (err: unknown) {
        this.transition("degraded", err);
      }
    }
    return {
      ...info,
      mode: this.currentMode,
      backend: this.backend.name,
      activeSessions: active.length,
      localSessions: this.localUserIds().length,
      ttlSeconds: this.ttlSeconds,
    };
  }

  async close(): Promise<void> {
    await this.backend.close();
  }

  private localUserIds(): string[] {
    const ids: string[] = [];
    for (const [userId, session] of this.cache.entries()) {
      if (!this.isExpired(session)) ids.push(userId);
    }
    return ids;
  }

  private isExpired(session: Session): boolean {
    return this.now() - session.lastActivityAt > session.ttlSeconds * 1000;
  }

  private newSession(userId: string): Session {
    const now = this.now();
    return {
      sessionId: randomUUID(),
      userId,
      createdAt: now,
      lastActivityAt: now,
      ttlSeconds: this.ttlSeconds,
      version: 0,
      messages: [],
      metadata: { events: [] },
    };
  }

  /** Run one durable call, rejecting with DeadlineExceededError once it outlives the timeout. */
  private async durable<T>(operation: string, call: () => Promise<T>): Promise<T> {
    const deadline = new Deadline(this.backendTimeoutMs, `${this.backend.name} ${operation}`);
    try {
      return await deadline.race(call());
    } finally {
      deadline.dispose();
    }
  }

  /** Live session from the cache or the durable store, without creating one. */
  private async peek(userId: string): Promise<Session | null> {
    const cached = this.cache.get(userId);
    if (cached) {
      if (!this.isExpired(cached)) return cached;
      this.logger.debug({ userId }, "Local session expired");
      this.cache.delete(userId);
      this.unsynced.delete(cached.sessionId);
    }
    if (this.currentMode === "degraded") return null;

    try {
      await this.flushPendingDelete(userId);
      const remote = await this.durable("load", () => this.backend.load(userId));
      if (!remote || this.isExpired(remote)) return null;
      this.cache.set(userId, remote);
      return remote;
    } catch (err: unknown) {
      this.transition("degraded", err);
      return null;
    }
  }

  /**
   * Apply `mutate` to the local session, cache the result, then persist it.
   * Returns the session as stored, or the local copy when the durable write
   * did not happen.
   */
  private async write(userId: string, mutate: Mutation): Promise<Session> {
    return this.locks.run(userId, async () => {
      const local = mutate((await this.peek(userId)) ?? this.newSession(userId));
      this.cache.set(userId, local);

      if (this.currentMode === "degraded" && !(await this.reprobe())) {
        this.unsynced.add(local.sessionId);
        return structuredClone(local);
      }

      try {
        const stored = await this.persist(local, mutate);
        this.unsynced.delete(local.sessionId);
        this.cache.set(userId, stored);
        return structuredClone(stored);
      } catch (err: unknown) {
        if (err instanceof ConflictError) {
          this.logger.warn({ userId, err }, "Session write lost to concurrent writers");
        } else {
          this.transition("degraded", err);
        }
        this.unsynced.add(local.sessionId);
        return structuredClone(local);
      }
    });
  }

  private async flushPendingDelete(userId: string): Promise<void> {
    if (!this.pendingDeletes.has(userId)) return;
    await this.durable("delete", () => this.backend.delete(userId));
    this.pendingDeletes.delete(userId);
  }

  /**
   * Compare-and-set loop. Unsynced local copies are merged into the durable
   * record. Otherwise `mutate` is re-applied to the durable state, or to a
   * fresh session when a previously persisted record is gone.
   */
  private async persist(local: Session, mutate: Mutation): Promise<Session> {
    await this.flushPendingDelete(local.userId);
    for (let attempt = 0; attempt <= this.maxCasRetries; attempt++) {
      const remote = await this.durable("load", () => this.backend.load(local.userId));
      const expectedVersion = remote?.version ?? 0;
      const live = remote && !this.isExpired(remote) ? remote : null;

      let base: Session;
      if (this.unsynced.has(local.sessionId)) {
        base = live ? mergeSessions(live, local) : local;
      } else if (live) {
        base = mutate(live);
      } else if (local.version === 0) {
        // Created by this write.
        base = local;
      } else {
        this.logger.debug({ userId: local.userId }, "Durable session gone, dropping cached copy");
        base = mutate(this.newSession(local.userId));
      }
      const next: Session = { ...base, version: expectedVersion + 1 };

      const written = await this.durable("compareAndSet", () =>
        this.backend.compareAndSet(next, expectedVersion, this.ttlSeconds),
      );
      if (written) return next;
      this.logger.debug(
        { userId: local.userId, expectedVersion, attempt },
        "Session version conflict, reloading",
      );
    }
    throw new ConflictError(
      `session ${local.userId} still conflicted after ${String(this.maxCasRetries)} retries`,
    );
  }

  private async reprobe(): Promise<boolean> {
    if (this.now() - this.lastProbeAt < this.reprobeIntervalMs) return false;
    return (await this.probe()) === "durable";
  }

  private transition(next: SessionBackendMode, cause?: unknown): void {
    if (next === this.currentMode) return;
    const previous = this.currentMode;
    this.currentMode = next;
    if (next === "degraded") {
      this.logger.warn({ from: previous, to: next, err: cause, backend: this.backend.name }, "Session store degraded");
    } else {
      this.logger.info({ from: previous, to: next, backend: this.backend.name }, "Session store durable");
    }
  }
}

function withLastState(metadata: Session["metadata"], lastState: string | undefined): Session["metadata"] {
  return lastState === undefined ? metadata : { ...metadata, lastState };
}
