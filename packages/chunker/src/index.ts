export type { IChunker } from "./chunker.interface.js";
export { SlidingWindowChunker } from "./sliding-window-chunker.js";
export { RecursiveChunker } from "./recursive-chunker.js";
export { createChunker } from "./factory.js";
export { assertChunkingOptions, chunkId } from "./chunk-builder.js";
