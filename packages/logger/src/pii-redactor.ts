/**
 * Utilities to redact secrets and e-mail addresses from log output.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
  "cookie",
  "ssn",
  "creditcard",
  "credit_card",
  "accesstoken",
  "refreshtoken",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair.
 *
 * - If the key matches a known sensitive field name the entire value is replaced
 *   with "[REDACTED]".
 * - If the value is a string that contains email-like patterns, those patterns
 *   are replaced with "[REDACTED]".
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Apply {@link redactValue} to every top-level field of a log record.
 */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = redactValue(key, value);
  }
  return result;
}

/**
 * JSON-path strings for Pino's `redact` option.
 */
export const REDACT_PATHS: string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "ssn",
  "creditCard",
  "credit_card",
  "accessToken",
  "refreshToken",
  // One level of nesting (e.g. headers.authorization)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.cookie",
  "*.ssn",
  "*.creditCard",
  "*.credit_card",
  "*.accessToken",
  "*.refreshToken",
];
