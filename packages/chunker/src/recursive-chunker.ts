import type { Chunk, ChunkingOptions, Document } from "@groundline/types";
import type { IChunker } from "./chunker.interface.js";
import { assertChunkingOptions, buildChunk } from "./chunk-builder.js";

const DEFAULT_SEPARATORS = ["\n\n", "\n", " "];

interface Span {
  start: number;
  end: number;
}

/**
 * Recursive splitting with a separator hierarchy.
 * Tries larger separators first, falling back to smaller ones and finally to
 * hard cuts, then merges the pieces into windows of at most `chunkSize`
 * characters. Trailing pieces totalling at most `overlap` characters are
 * carried into the next window.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = (separators ?? DEFAULT_SEPARATORS).filter((sep) => sep.length > 0);
  }

  split(document: Document, options: ChunkingOptions): Chunk[] {
    assertChunkingOptions(options);
    const text = document.rawText;
    const pieces = this.splitRecursive(text, { start: 0, end: text.length }, options.chunkSize, 0);
    const windows = this.merge(pieces, options);

    return windows.map((window, index) => buildChunk(document, index, window.start, window.end));
  }

  private splitRecursive(text: string, span: Span, chunkSize: number, separatorIndex: number): Span[] {
    if (isBlank(text, span)) {
      return [];
    }

    if (span.end - span.start <= chunkSize) {
      return [span];
    }

    const separator = this.separators[separatorIndex];
    if (separator === undefined) {
      // Hard cut at chunkSize characters
      const results: Span[] = [];
      for (let start = span.start; start < span.end; start += chunkSize) {
        const piece = { start, end: Math.min(start + chunkSize, span.end) };
        if (!isBlank(text, piece)) {
          results.push(piece);
        }
      }
      return results;
    }

    const results: Span[] = [];
    for (const part of splitSpan(text, span, separator)) {
      results.push(...this.splitRecursive(text, part, chunkSize, separatorIndex + 1));
    }
    return results;
  }

  private merge(pieces: Span[], { chunkSize, overlap }: ChunkingOptions): Span[] {
    const windows: Span[] = [];
    let current: Span[] = [];

    for (const piece of pieces) {
      const first = current[0];
      if (first && piece.end - first.start > chunkSize) {
        windows.push(toWindow(current));

        // Keep a tail no longer than `overlap` that still leaves room for the new piece
        while (current.length > 0) {
          const head = current[0];
          const tail = current[current.length - 1];
          if (!head || !tail) break;
          if (tail.end - head.start <= overlap && piece.end - head.start <= chunkSize) break;
          current = current.slice(1);
        }
      }
      current.push(piece);
    }

    if (current.length > 0) {
      windows.push(toWindow(current));
    }

    return windows;
  }
}

function isBlank(text: string, span: Span): boolean {
  return text.slice(span.start, span.end).trim().length === 0;
}

function splitSpan(text: string, span: Span, separator: string): Span[] {
  const parts: Span[] = [];
  let cursor = span.start;

  for (;;) {
    const at = text.indexOf(separator, cursor);
    const stop = at === -1 || at + separator.length > span.end ? span.end : at;
    parts.push({ start: cursor, end: stop });
    if (stop === span.end) break;
    cursor = stop + separator.length;
  }

  return parts;
}

function toWindow(spans: Span[]): Span {
  const first = spans[0];
  const last = spans[spans.length - 1];
  if (!first || !last) {
    throw new Error("Cannot build a window from zero spans");
  }
  return { start: first.start, end: last.end };
}
