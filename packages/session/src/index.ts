export { SessionStore } from "./session-store.js";
export type { SessionStoreOptions, WriteOptions } from "./session-store.js";
export type { DurableSessionBackend } from "./durable-backend.js";
export { SESSION_KEY_PREFIX, sessionKey } from "./durable-backend.js";
export { RedisSessionBackend } from "./redis-backend.js";
export type { RedisSessionBackendOptions } from "./redis-backend.js";
export { InMemorySessionBackend } from "./memory-backend.js";
export { formatHistory, selectHistory, HISTORY_HEADER } from "./history.js";
export type { HistoryBudget } from "./history.js";
export { appendMessages, mergeSessions, mergeMessages, MAX_SESSION_EVENTS } from "./merge.js";
export { parseSessionRecord, sessionSchema } from "./session-schema.js";
