export * from "./types/index.js";
export * from "./parser/index.js";
export * from "./stylesheet/index.js";
export { StyleEventEmitter, withFailureEvent } from "./events/emitter.js";
export type { StyleEventListener } from "./events/emitter.js";
