export { KeyedLock } from "./keyed-lock.js";
export { Deadline } from "./deadline.js";
