/**
 * Creates structured Pino logger instances with redaction, pretty-printing
 * in development, and JSON output in production / test environments.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactRecord } from "./pii-redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

/**
 * - In **development** we pipe through `pino-pretty` for human-readable output.
 * - In **production / test** we emit structured JSON (no transport needed).
 */
function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

/**
 * Create a new root Pino logger.
 *
 * String fields pass through {@link redactRecord} so that user text quoted in
 * log lines never carries e-mail addresses.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "groundline";

  const transport = buildTransport();

  return pino({
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    formatters: {
      log: (record) => redactRecord(record),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(transport ? { transport } : {}),
  });
}

/**
 * Create a child logger that inherits the parent's configuration and adds
 * scoped bindings (e.g. `component`, `userId`, `turnId`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/**
 * A logger that discards everything. Used as the default collaborator in
 * components constructed without one, and in tests.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
