import { ExternalServiceError } from "@groundline/errors";
import type { DurableBackendInfo, Session } from "@groundline/types";
import { SESSION_KEY_PREFIX, sessionKey } from "./durable-backend.js";
import type { DurableSessionBackend } from "./durable-backend.js";
import { parseSessionRecord } from "./session-schema.js";

interface StoredRecord {
  raw: string;
  version: number;
  expiresAt: number;
}

/**
 * In-process durable backend. Records are kept serialized, as Redis keeps them,
 * and the whole store can be switched unreachable to exercise degraded mode.
 */
export class InMemorySessionBackend implements DurableSessionBackend {
  readonly name = "memory";
  reachable = true;
  /** Number of successful compare-and-set writes. */
  writes = 0;

  private readonly records = new Map<string, StoredRecord>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  async ping(): Promise<void> {
    this.assertReachable("ping");
  }

  async load(userId: string): Promise<Session | null> {
    this.assertReachable("get");
    const record = this.live(userId);
    if (!record) return null;
    const parsed = parseSessionRecord(record.raw);
    return parsed.ok ? parsed.session : null;
  }

  async compareAndSet(
    session: Session,
    expectedVersion: number,
    ttlSeconds: number,
  ): Promise<boolean> {
    this.assertReachable("compareAndSet");
    const current = this.live(session.userId)?.version ?? 0;
    if (current !== expectedVersion) return false;

    this.records.set(sessionKey(session.userId), {
      raw: JSON.stringify(session),
      version: session.version,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
    this.writes++;
    return true;
  }

  async delete(userId: string): Promise<void> {
    this.assertReachable("delete");
    this.records.delete(sessionKey(userId));
  }

  async activeUserIds(): Promise<string[]> {
    this.assertReachable("scan");
    const ids: string[] = [];
    for (const key of [...this.records.keys()]) {
      const userId = key.slice(SESSION_KEY_PREFIX.length);
      if (this.live(userId)) ids.push(userId);
    }
    return ids;
  }

  async info(): Promise<DurableBackendInfo> {
    this.assertReachable("info");
    return {};
  }

  async close(): Promise<void> {
    this.records.clear();
  }

  /** Write a record directly, bypassing version checks, as a concurrent writer would. */
  seed(session: Session, ttlSeconds = session.ttlSeconds): void {
    this.records.set(sessionKey(session.userId), {
      raw: JSON.stringify(session),
      version: session.version,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  /** Store arbitrary text under a user's key. */
  seedRaw(userId: string, raw: string, ttlSeconds = 3600): void {
    this.records.set(sessionKey(userId), { raw, version: 0, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  peek(userId: string): Session | null {
    const record = this.live(userId);
    if (!record) return null;
    const parsed = parseSessionRecord(record.raw);
    return parsed.ok ? parsed.session : null;
  }

  private live(userId: string): StoredRecord | undefined {
    const key = sessionKey(userId);
    const record = this.records.get(key);
    if (record && record.expiresAt <= this.now()) {
      this.records.delete(key);
      return undefined;
    }
    return record;
  }

  private assertReachable(operation: string): void {
    if (!this.reachable) {
      throw new ExternalServiceError(`memory backend ${operation} failed: unreachable`, "memory");
    }
  }
}
