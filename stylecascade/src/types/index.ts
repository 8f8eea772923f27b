export * from "./dom.js";
export * from "./stylesheet.js";
export * from "./styled.js";
export * from "./errors.js";
export * from "./events.js";
