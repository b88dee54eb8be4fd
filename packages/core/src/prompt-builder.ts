export const SYSTEM_INSTRUCTIONS = [
  "You are a helpful AI assistant. Use the following pieces of context to answer the question at the end.",
  "If you don't know the answer based on the context, just say that you don't know, don't try to make up an answer.",
  "Always provide citations to the source documents when possible.",
].join("\n");

export const NO_CONTEXT = "(no relevant context found)";

export interface PromptParts {
  query: string;
  /** Output of assembleContext; empty when retrieval found nothing. */
  context: string;
  /** Output of formatHistory; empty for a first turn. */
  history: string;
}

export function buildPrompt({ query, context, history }: PromptParts): string {
  const sections = [SYSTEM_INSTRUCTIONS];
  if (history.length > 0) sections.push(history);
  sections.push(`Context:\n${context.length > 0 ? context : NO_CONTEXT}`);
  sections.push(`Question: ${query}`);
  sections.push("Answer:");
  return sections.join("\n\n");
}
