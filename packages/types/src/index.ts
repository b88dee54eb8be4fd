export type * from "./api.js";
export type * from "./chat.js";
export type * from "./chunk.js";
export type * from "./config.js";
export type * from "./document.js";
export type * from "./guardrails.js";
export type * from "./pipeline.js";
export type * from "./session.js";
