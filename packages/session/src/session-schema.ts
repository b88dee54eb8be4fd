import { z } from "zod";
import type { Session } from "@groundline/types";

const messageSchema = z.object({
  id: z.string().min(1),
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.number().int().nonnegative(),
  sources: z.array(z.string()),
  redactionsApplied: z.boolean(),
});

const eventSchema = z.object({
  type: z.enum(["input_blocked", "output_blocked", "generation_failed"]),
  turnId: z.string(),
  at: z.number().int().nonnegative(),
  reasonCode: z.string(),
  ruleIds: z.array(z.string()),
});

export const sessionSchema = z.object({
  sessionId: z.string().min(1),
  userId: z.string().min(1),
  createdAt: z.number().int().nonnegative(),
  lastActivityAt: z.number().int().nonnegative(),
  ttlSeconds: z.number().int().positive(),
  version: z.number().int().nonnegative(),
  messages: z.array(messageSchema),
  metadata: z.object({
    events: z.array(eventSchema),
    lastState: z.string().optional(),
  }),
});

export type SessionParseResult =
  | { ok: true; session: Session }
  | { ok: false; issues: string[] };

/** Decode a stored JSON record. */
export function parseSessionRecord(raw: string): SessionParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    return { ok: false, issues: [err instanceof Error ? err.message : "invalid JSON"] };
  }

  const result = sessionSchema.safeParse(json);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }
  return { ok: true, session: result.data };
}
