import { Redis } from "ioredis";
import type { RedisOptions } from "ioredis";
import { ExternalServiceError, errorMessage } from "@groundline/errors";
import { createSilentLogger } from "@groundline/logger";
import type { Logger } from "@groundline/logger";
import type { DurableBackendInfo, Session } from "@groundline/types";
import { SESSION_KEY_PREFIX, sessionKey } from "./durable-backend.js";
import type { DurableSessionBackend } from "./durable-backend.js";
import { parseSessionRecord } from "./session-schema.js";

/**
 * KEYS[1] session key; ARGV[1] expected version, ARGV[2] record, ARGV[3] ttl seconds.
 * A stored record that cannot be decoded counts as version 0.
 */
const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
local expected = tonumber(ARGV[1])
local version = 0
if current then
  local ok, decoded = pcall(cjson.decode, current)
  if ok and type(decoded) == 'table' and tonumber(decoded['version']) then
    version = tonumber(decoded['version'])
  end
end
if version ~= expected then
  return 0
end
redis.call('SET', KEYS[1], ARGV[2], 'EX', ARGV[3])
return 1
`;

const DEFAULT_COMMAND_TIMEOUT_MS = 1_000;
const SCAN_BATCH = 100;

export interface RedisSessionBackendOptions {
  url: string;
  logger?: Logger;
  /** Per-command timeout; a stalled server rejects instead of hanging. Default 1000. */
  commandTimeoutMs?: number;
  /** Extra ioredis options, merged over the fail-fast defaults. */
  redisOptions?: RedisOptions;
}

/**
 * Session records stored as JSON strings under `session:<userId>`, expiring
 * through the key's native EX.
 */
export class RedisSessionBackend implements DurableSessionBackend {
  readonly name = "redis";
  private readonly client: Redis;
  private readonly logger: Logger;

  constructor(options: RedisSessionBackendOptions) {
    this.logger = options.logger ?? createSilentLogger();
    // Fail fast: a request against a down server rejects instead of queueing.
    this.client = new Redis(options.url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      commandTimeout: options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
      ...options.redisOptions,
    });
    this.client.on("error", (err: unknown) => {
      this.logger.debug({ err }, "Redis connection error");
    });
  }

  async ping(): Promise<void> {
    await this.call("ping", async () => {
      if (this.client.status === "wait" || this.client.status === "end") {
        await this.client.connect();
      }
      await this.client.ping();
    });
  }

  async load(userId: string): Promise<Session | null> {
    const raw = await this.call("get", () => this.client.get(sessionKey(userId)));
    if (raw === null) return null;

    const parsed = parseSessionRecord(raw);
    if (!parsed.ok) {
      this.logger.warn({ userId, issues: parsed.issues }, "Discarding invalid session record");
      return null;
    }
    return parsed.session;
  }

  async compareAndSet(
    session: Session,
    expectedVersion: number,
    ttlSeconds: number,
  ): Promise<boolean> {
    const result = await this.call("compareAndSet", () =>
      this.client.eval(
        COMPARE_AND_SET_SCRIPT,
        1,
        sessionKey(session.userId),
        String(expectedVersion),
        JSON.stringify(session),
        String(ttlSeconds),
      ),
    );
    return result === 1;
  }

  async delete(userId: string): Promise<void> {
    await this.call("delete", () => this.client.del(sessionKey(userId)));
  }

  /** Walks `session:*` with SCAN, so a large keyspace never blocks the server. */
  async activeUserIds(): Promise<string[]> {
    return this.call("scan", async () => {
      const ids = new Set<string>();
      let cursor = "0";
      do {
        const [next, keys] = await this.client.scan(
          cursor,
          "MATCH",
          `${SESSION_KEY_PREFIX}*`,
          "COUNT",
          SCAN_BATCH,
        );
        cursor = next;
        for (const key of keys) ids.add(key.slice(SESSION_KEY_PREFIX.length));
      } while (cursor !== "0");
      return [...ids];
    });
  }

  async info(): Promise<DurableBackendInfo> {
    const raw = await this.call("info", () => this.client.info());
    return parseInfo(raw);
  }

  async close(): Promise<void> {
    if (this.client.status === "end") return;
    try {
      await this.client.quit();
    } catch (err: unknown) {
      this.logger.debug({ err }, "Redis quit failed, disconnecting");
      this.client.disconnect();
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      throw new ExternalServiceError(`Redis ${operation} failed: ${errorMessage(err)}`, "redis", {
        cause: err,
      });
    }
  }
}

/** Picks the memory and client figures out of an INFO reply. */
export function parseInfo(raw: string): DurableBackendInfo {
  const fields = new Map<string, string>();
  for (const line of raw.split(/\r?\n/)) {
    const separator = line.indexOf(":");
    if (separator > 0 && !line.startsWith("#")) {
      fields.set(line.slice(0, separator), line.slice(separator + 1).trim());
    }
  }
  const info: DurableBackendInfo = {};
  const memoryUsed = fields.get("used_memory_human");
  if (memoryUsed !== undefined) info.memoryUsed = memoryUsed;
  const clients = Number(fields.get("connected_clients"));
  if (Number.isInteger(clients)) info.connectedClients = clients;
  return info;
}
