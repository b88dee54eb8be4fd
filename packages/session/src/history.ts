import type { Message } from "@groundline/types";

export interface HistoryBudget {
  maxMessages: number;
  maxChars: number;
}

export const HISTORY_HEADER = "Previous conversation:";

function renderLine(message: Message): string {
  return `${message.role === "user" ? "User" : "Assistant"}: ${message.content}`;
}

/**
 * Newest messages that fit the budget, in chronological order. Walks back from
 * the newest message and stops at the first one that would exceed `maxChars`
 * (lines joined by newlines, header excluded).
 */
export function selectHistory(messages: readonly Message[], budget: HistoryBudget): Message[] {
  const kept: Message[] = [];
  let used = 0;

  for (let i = messages.length - 1; i >= 0 && kept.length < budget.maxMessages; i--) {
    const message = messages[i];
    if (!message) break;
    const cost = renderLine(message).length + (kept.length > 0 ? 1 : 0);
    if (used + cost > budget.maxChars) break;
    used += cost;
    kept.push(message);
  }

  return kept.reverse();
}

/** Render history for a prompt; empty string when nothing fits. */
export function formatHistory(messages: readonly Message[], budget: HistoryBudget): string {
  const selected = selectHistory(messages, budget);
  if (selected.length === 0) return "";
  return [HISTORY_HEADER, ...selected.map(renderLine)].join("\n");
}
