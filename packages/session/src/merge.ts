import type { Message, Session, SessionEvent } from "@groundline/types";

export const MAX_SESSION_EVENTS = 20;

function byTimestamp<T>(items: T[], at: (item: T) => number): T[] {
  return items
    .map((item, position) => ({ item, position }))
    .sort((a, b) => at(a.item) - at(b.item) || a.position - b.position)
    .map(({ item }) => item);
}

/**
 * Local append: existing order is kept and new messages go at the end. A
 * timestamp earlier than the last stored one is clamped up to it.
 */
export function appendMessages(base: readonly Message[], incoming: readonly Message[]): Message[] {
  const seen = new Set(base.map((message) => message.id));
  const result = [...base];
  let last = base.at(-1)?.timestamp ?? Number.NEGATIVE_INFINITY;
  for (const message of incoming) {
    if (seen.has(message.id)) continue;
    seen.add(message.id);
    last = Math.max(last, message.timestamp);
    result.push(message.timestamp === last ? message : { ...message, timestamp: last });
  }
  return result;
}

/** Reconciliation of two divergent copies: union by id, ordered by time. */
export function mergeMessages(base: readonly Message[], incoming: readonly Message[]): Message[] {
  const seen = new Set(base.map((message) => message.id));
  const added = incoming.filter((message) => !seen.has(message.id));
  return byTimestamp([...base, ...added], (message) => message.timestamp);
}

export function mergeEvents(base: readonly SessionEvent[], incoming: readonly SessionEvent[]): SessionEvent[] {
  const key = (event: SessionEvent): string => `${event.turnId}:${event.type}`;
  const seen = new Set(base.map(key));
  const added = incoming.filter((event) => !seen.has(key(event)));
  return byTimestamp([...base, ...added], (event) => event.at).slice(-MAX_SESSION_EVENTS);
}

/**
 * Union of a remote record and a local copy. The remote record keeps its
 * identity; messages and events are merged by id and ordered by time.
 */
export function mergeSessions(remote: Session, local: Session): Session {
  const localIsNewer = local.lastActivityAt >= remote.lastActivityAt;
  const lastState = localIsNewer
    ? (local.metadata.lastState ?? remote.metadata.lastState)
    : (remote.metadata.lastState ?? local.metadata.lastState);

  return {
    ...remote,
    createdAt: Math.min(remote.createdAt, local.createdAt),
    lastActivityAt: Math.max(remote.lastActivityAt, local.lastActivityAt),
    messages: mergeMessages(remote.messages, local.messages),
    metadata: {
      events: mergeEvents(remote.metadata.events, local.metadata.events),
      ...(lastState !== undefined ? { lastState } : {}),
    },
  };
}
