import { describe, it, expect } from "vitest";
import type { Message } from "@groundline/types";
import { appendMessages, mergeMessages } from "./merge.js";

function message(id: string, timestamp: number): Message {
  return { id, role: "user", content: id, timestamp, sources: [], redactionsApplied: false };
}

describe("appendMessages", () => {
  it("adds to the end and clamps earlier timestamps to the last one", () => {
    const result = appendMessages([message("a", 300)], [message("b", 200), message("c", 400), message("d", 100)]);

    expect(result.map((m) => [m.id, m.timestamp])).toEqual([
      ["a", 300],
      ["b", 300],
      ["c", 400],
      ["d", 400],
    ]);
  });

  it("skips ids already present", () => {
    const result = appendMessages([message("a", 1)], [message("a", 2), message("b", 3), message("b", 4)]);
    expect(result.map((m) => [m.id, m.timestamp])).toEqual([
      ["a", 1],
      ["b", 3],
    ]);
  });
});

describe("mergeMessages", () => {
  it("orders the union by timestamp", () => {
    const result = mergeMessages([message("a", 1), message("c", 3)], [message("b", 2), message("a", 1)]);
    expect(result.map((m) => m.id)).toEqual(["a", "b", "c"]);
  });
});
