import type { DurableBackendInfo, Session } from "@groundline/types";

/**
 * Whole-record store behind the session cache.
 *
 * `compareAndSet` writes `session` only if the stored record's version equals
 * `expectedVersion` (0 when no record exists) and returns whether it wrote.
 * Every method rejects when the store is unreachable.
 */
export interface DurableSessionBackend {
  readonly name: string;
  ping(): Promise<void>;
  load(userId: string): Promise<Session | null>;
  compareAndSet(session: Session, expectedVersion: number, ttlSeconds: number): Promise<boolean>;
  delete(userId: string): Promise<void>;
  /** User ids that currently have a stored record. */
  activeUserIds(): Promise<string[]>;
  info(): Promise<DurableBackendInfo>;
  close(): Promise<void>;
}

export const SESSION_KEY_PREFIX = "session:";

export function sessionKey(userId: string): string {
  return `${SESSION_KEY_PREFIX}${userId}`;
}
