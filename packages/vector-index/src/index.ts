export type { IVectorIndex } from "./vector-index.interface.js";
export { InMemoryVectorIndex } from "./in-memory-vector-index.js";
export { cosineSimilarity } from "./cosine.js";
