import type { PromptFormat, RetrievedResult } from "@groundline/types";

/**
 * Lay retrieved chunks out for the prompt.
 *
 * - xml: each chunk in a `<document>` element
 * - markdown: headed sections separated by rules
 * - plain: numbered sections
 */
export function assembleContext(results: RetrievedResult[], format: PromptFormat): string {
  if (results.length === 0) return "";

  switch (format) {
    case "xml":
      return assembleXml(results);
    case "markdown":
      return assembleMarkdown(results);
    case "plain":
    default:
      return assemblePlain(results);
  }
}

function assembleXml(results: RetrievedResult[]): string {
  const parts = results.map(
    ({ chunk }, i) =>
      `<document index="${String(i + 1)}" source="${chunk.metadata.filename}">\n${chunk.text}\n</document>`,
  );

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function assembleMarkdown(results: RetrievedResult[]): string {
  const parts = results.map(
    ({ chunk }, i) => `### Source ${String(i + 1)} (${chunk.metadata.filename})\n\n${chunk.text}`,
  );

  return `## Retrieved Context\n\n${parts.join("\n\n---\n\n")}`;
}

function assemblePlain(results: RetrievedResult[]): string {
  const parts = results.map(
    ({ chunk }, i) => `[${String(i + 1)}] (Source: ${chunk.metadata.filename})\n${chunk.text}`,
  );

  return parts.join("\n\n");
}
