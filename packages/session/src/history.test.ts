import { describe, it, expect } from "vitest";
import type { Message, MessageRole } from "@groundline/types";
import { formatHistory, selectHistory } from "./history.js";

function message(id: string, role: MessageRole, content: string): Message {
  return { id, role, content, timestamp: Number(id.slice(1)), sources: [], redactionsApplied: false };
}

// Rendered lines: "User: hi" (8), "Assistant: hello there" (22), "User: how are you?" (18)
const conversation = [
  message("m1", "user", "hi"),
  message("m2", "assistant", "hello there"),
  message("m3", "user", "how are you?"),
];

describe("formatHistory", () => {
  it("renders the newest messages chronologically", () => {
    expect(formatHistory(conversation, { maxMessages: 2, maxChars: 1000 })).toBe(
      "Previous conversation:\nAssistant: hello there\nUser: how are you?",
    );
  });

  it("keeps everything that fits", () => {
    expect(formatHistory(conversation, { maxMessages: 10, maxChars: 50 })).toBe(
      "Previous conversation:\nUser: hi\nAssistant: hello there\nUser: how are you?",
    );
  });

  it("stops at the first message that would exceed the character budget", () => {
    expect(selectHistory(conversation, { maxMessages: 10, maxChars: 41 }).map((m) => m.id)).toEqual([
      "m2",
      "m3",
    ]);
    expect(selectHistory(conversation, { maxMessages: 10, maxChars: 40 }).map((m) => m.id)).toEqual([
      "m3",
    ]);
  });

  it("returns an empty string when nothing fits", () => {
    expect(formatHistory(conversation, { maxMessages: 10, maxChars: 10 })).toBe("");
    expect(formatHistory([], { maxMessages: 10, maxChars: 1000 })).toBe("");
  });
});
