export type { ILlmProvider } from "./llm-provider.interface.js";
export { CohereChatProvider } from "./cohere-chat-provider.js";
export type { CohereChatProviderConfig } from "./cohere-chat-provider.js";
export { createLlmProvider } from "./factory.js";
export type { LlmFactoryConfig } from "./factory.js";
