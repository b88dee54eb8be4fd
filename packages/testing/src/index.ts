export { BagOfWordsEmbeddingProvider, tokenize } from "./bag-of-words-provider.js";
export { ScriptedLlmProvider, hangUntilAborted } from "./scripted-llm-provider.js";
export type { ScriptStep } from "./scripted-llm-provider.js";
